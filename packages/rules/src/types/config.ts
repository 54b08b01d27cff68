export type GeneratedFile = {
  /** Relative to the write target. */
  path: string;
  content: string;
  format: "md" | "mdc" | "json";
};

export type WriteResult = {
  /** Relative paths of the files written (or planned, for a dry run). */
  files: string[];
  warnings: string[];
};

/**
 * Everything a codec may need from the environment, passed in at construction.
 */
export type CodecContext = {
  homeDir: string;
  env: Record<string, string | undefined>;
};

export type RuleportConfig = {
  store?: {
    path?: string;
    remote?: string;
  };
  homeDir?: string;
};
