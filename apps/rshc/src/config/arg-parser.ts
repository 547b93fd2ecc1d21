import { Command } from "commander";
import { createRequire } from "node:module";
import type { RshcConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

type CliOptions = {
  top: string;
  trace?: boolean;
  emitIr?: boolean;
  json?: boolean;
  msgPack?: boolean;
};

const createCommand = (): Command =>
  new Command()
    .name("rshc")
    .description("Elaborate a parsed program bundle into its lifted IR")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<bundle>", "JSON AST bundle to elaborate (`-` reads stdin)")
    .option("--top <name>", "exported binding of the entry module", "main")
    .option("--trace", "print evaluator trace output")
    .option("--emit-ir", "write the pretty-printed IR to stdout")
    .option("--json", "write the program as JSON to stdout")
    .option("-m, --msg-pack", "write the program as MessagePack to stdout");

export const parseConfig = (argv: readonly string[]): RshcConfig => {
  const program = createCommand();
  program.parse(["node", "rshc", ...argv]);
  const opts = program.opts<CliOptions>();
  const [bundle] = program.args;

  return {
    bundle,
    top: opts.top,
    trace: opts.trace ?? process.env.DEBUG_ELAB === "1",
    emitIr: opts.emitIr ?? false,
    json: opts.json ?? false,
    msgPack: opts.msgPack ?? false,
  };
};

export const getConfigFromCli = (): RshcConfig => parseConfig(process.argv.slice(2));
