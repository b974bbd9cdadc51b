export interface CliOptions {
  verbose?: boolean;
  validate?: boolean;
  csv?: string;
  stats?: boolean;
  scratch?: boolean;
}

export interface ToolConfig {
  verbose: boolean;
  validate: boolean;
  csvPath: string | undefined;
  stats: boolean;
  scratch: boolean;
  // narrative death reports carry no thread id
  deathThreadId: string;
}
