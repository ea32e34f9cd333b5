/**
 * Options accepted by every command. Declared on the root program and read
 * from it by subcommands.
 */
export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  logFile?: string;
  glob?: string;
};

export type BrowseOptions = GlobalOptions & {
  refresh?: boolean;
  resume?: boolean;
  lazy?: boolean;
  sort?: string;
  depth?: string;
  limit?: string;
  expand?: string[];
  /** False with --no-scan */
  scan: boolean;
};
