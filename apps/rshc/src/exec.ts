import { readFileSync } from "node:fs";
import { stdout } from "node:process";
import { encode } from "@msgpack/msgpack";
import {
  DiagnosticError,
  elaborate,
  formatProgram,
  type Bundle,
  type Diagnostic,
  type Program,
} from "@rsh/elaborator";
import { BundleFormatError, parseBundle } from "./bundle-schema.js";
import { getConfig } from "./config/index.js";
import type { RshcConfig } from "./config/types.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { normalizeOutput, printJson } from "./output.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  process.exitCode = runCli(getConfig());
}

export const loadBundle = (path: string): Bundle => {
  const source = path === "-" ? "<stdin>" : path;
  const text = readFileSync(path === "-" ? 0 : path, "utf8");
  return parseBundle(JSON.parse(text), source);
};

const emitProgram = (config: RshcConfig, program: Program): void => {
  if (config.msgPack) {
    stdout.write(encode(normalizeOutput({ value: program })));
    return;
  }
  if (config.json) {
    printJson(program);
  }
  if (config.emitIr || !config.json) {
    console.log(formatProgram(program));
  }
};

const reportDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  const color = Boolean(process.stderr.isTTY);
  for (const diagnostic of diagnostics) {
    console.error(formatCliDiagnostic(diagnostic, { color }));
  }
};

/** Elaborates the configured bundle and writes the requested output. Returns the exit code. */
export const runCli = (config: RshcConfig): number => {
  const bundle = loadBundle(config.bundle);
  const { program, diagnostics } = elaborate(bundle, {
    top: config.top,
    trace: config.trace,
  });
  if (!program) {
    reportDiagnostics(diagnostics);
    return 1;
  }
  emitProgram(config, program);
  return 0;
};

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    reportDiagnostics([error.diagnostic]);
  } else if (error instanceof BundleFormatError || error instanceof SyntaxError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exit(1);
}
