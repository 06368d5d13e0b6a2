export type ImportkitCommand = "resolve";

export type ImportkitConfig = {
  command: ImportkitCommand;
  /** Dotted module reference, e.g. `foo.bar.baz` */
  module: string;
  /** Additional search roots, `--search-path` entries before `IMPORTKIT_PATH` */
  searchPaths: string[];
  /** Working directory to resolve from (default: the process cwd) */
  cwd?: string;
  /** Directory holding bundled resources such as the standard library */
  resourceRoot?: string;
  /** Print the resolution as JSON */
  json: boolean;
  /** Colorize diagnostics */
  color: boolean;
};
