export interface AppConfig {
  apiKey: string;
  hotkey: string;
  headerWidthPercent: number;
  headerHeightPercent: number;
  transparencyPercent: number;
  fontSize: number;
  currentIssueId: string | null;
  /** Header text that is not a tracker issue; exclusive with `currentIssueId`. */
  customTask: string | null;
  markdownOutputDir: string;
  markdownAutoGenerate: boolean;
  syncOnEdit: boolean;
}

export type ConfigKey = keyof AppConfig;
