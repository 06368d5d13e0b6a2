import { Command } from "commander";
import { createRequire } from "node:module";
import { delimiter } from "node:path";
import type { ImportkitConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const SEARCH_PATH_ENV = "IMPORTKIT_PATH";

const appendOptionValue = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

const searchPathsFromEnv = (
  env: Readonly<Record<string, string | undefined>>
): string[] =>
  (env[SEARCH_PATH_ENV] ?? "")
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean);

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

type ResolveOptions = {
  searchPath: string[];
  cwd?: string;
  resourceRoot?: string;
  json?: boolean;
  color: boolean;
};

export const getConfigFromCli = ({
  argv = process.argv.slice(2),
  env = process.env,
}: {
  argv?: readonly string[];
  env?: Readonly<Record<string, string | undefined>>;
} = {}): ImportkitConfig => {
  const parsed: { config?: ImportkitConfig } = {};
  const program: Command = createBaseCommand({
    name: "importkit",
    description: "Locate modules on the import search path",
  });

  program
    .command("resolve")
    .description("print the source file a module reference resolves to")
    .argument("<module>", "dotted module reference, e.g. foo.bar.baz")
    .option(
      "-I, --search-path <dir>",
      "additional search root (repeatable)",
      appendOptionValue,
      []
    )
    .option("--cwd <dir>", "working directory to resolve from")
    .option("--resource-root <dir>", "directory of bundled resources")
    .option("--json", "print the resolution as JSON")
    .option("--no-color", "disable colored diagnostics")
    .action((module: string, opts: ResolveOptions) => {
      parsed.config = {
        command: "resolve",
        module,
        searchPaths: [...opts.searchPath, ...searchPathsFromEnv(env)],
        cwd: opts.cwd,
        resourceRoot: opts.resourceRoot,
        json: Boolean(opts.json),
        color: opts.color,
      };
    });

  program.parse(["node", "importkit", ...argv]);
  if (!parsed.config) {
    program.help({ error: true });
  }
  return parsed.config;
};
