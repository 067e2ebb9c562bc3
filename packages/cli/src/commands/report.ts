export type ReportValue = string | number | boolean;

/**
 * What a subcommand produced: `text` is printed under `--out text`,
 * `data` as pretty JSON under `--out json`.
 */
export interface CommandReport {
  text: string;
  data: Record<string, ReportValue>;
}
