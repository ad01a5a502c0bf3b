#!/usr/bin/env node
import { Command, Option } from "commander";
import fs from "node:fs/promises";
import { parseNonNegativeInt, parsePositiveInt } from "./args.js";
import { DEFAULT_TOUCH_PATH, commandExists, runCargo, touchFile } from "./cargo/run.js";
import { OUTPUT_FORMATS, SORT_KEYS, loadConfigFile, mergeConfig } from "./config.js";
import { parseTypeSizeOutput } from "./parser/index.js";
import { DEFAULT_HTML_OUTPUT, writeHtmlReport } from "./render/html.js";
import { renderJson, renderText } from "./render/text.js";
import { selectTypes } from "./report/select.js";
import type { OutputFormat, SortKey, ToolConfig, TypeRecord } from "./types.js";

const program = new Command();

interface ShowCliOptions {
  config?: string;
  input?: string;
  touch?: string;
  toolchain?: string;
  format?: OutputFormat;
  output?: string;
  sort?: SortKey;
  sortSize?: boolean;
  reverse?: boolean;
  filter?: string;
  minSize?: number;
  indentUnit?: number;
  strictIndent?: boolean;
  stopOnMalformed?: boolean;
}

function toToolConfig(opts: ShowCliOptions): ToolConfig {
  return {
    toolchain: opts.toolchain,
    touch: opts.touch,
    output: opts.format,
    outFile: opts.output,
    sort: opts.sortSize ? "size" : opts.sort,
    reverse: opts.reverse,
    filter: opts.filter,
    minSize: opts.minSize,
    indentUnit: opts.indentUnit,
    strictIndent: opts.strictIndent,
    malformedHeader: opts.stopOnMalformed ? "stop" : undefined,
  };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function readCompilerOutput(cargoArgs: string[], input: string | undefined, settings: ToolConfig): Promise<string> {
  if (input) {
    if (cargoArgs.length > 0) {
      process.stderr.write(`Warning: cargo arguments are ignored with --input: ${cargoArgs.join(" ")}\n`);
    }
    return input === "-" ? readStdin() : fs.readFile(input, "utf8");
  }

  await touchFile(settings.touch ?? DEFAULT_TOUCH_PATH);
  return runCargo(cargoArgs, { toolchain: settings.toolchain });
}

async function emit(types: TypeRecord[], settings: ToolConfig): Promise<void> {
  const format = settings.output ?? "html";

  if (format === "html") {
    const saved = await writeHtmlReport(types, settings.outFile ?? DEFAULT_HTML_OUTPUT);
    process.stdout.write(`HTML output saved to: ${saved}\n`);
    return;
  }

  const rendered = format === "json" ? renderJson(types) : renderText(types);
  if (settings.outFile) {
    await fs.writeFile(settings.outFile, rendered, "utf8");
    process.stdout.write(`Output saved to: ${settings.outFile}\n`);
    return;
  }
  process.stdout.write(rendered);
}

async function runShow(cargoArgs: string[], opts: ShowCliOptions): Promise<void> {
  const fileConfig = opts.config ? await loadConfigFile(opts.config) : {};
  const settings = mergeConfig(fileConfig, toToolConfig(opts));

  const output = await readCompilerOutput(cargoArgs, opts.input, settings);
  const result = parseTypeSizeOutput(output, settings);
  for (const diagnostic of result.diagnostics) {
    process.stderr.write(`Warning: ${diagnostic.message}\n`);
  }
  if (result.types.length === 0) {
    process.stderr.write("Warning: no type sizes found in compiler output\n");
  }

  await emit(selectTypes(result.types, settings), settings);
}

function normalizeArgvForDefaultShow(argv: string[]): string[] {
  if (argv.length < 3) {
    return [...argv, "show"];
  }

  const first = argv[2];
  const knownCommands = new Set(["show", "doctor", "help"]);
  if (knownCommands.has(first) || first === "-h" || first === "--help" || first === "-V" || first === "--version") {
    return argv;
  }

  return [argv[0], argv[1], "show", ...argv.slice(2)];
}

program
  .name("rust-type-sizes")
  .description("Show the memory layout of Rust types reported by rustc -Zprint-type-sizes")
  .version("0.1.0");

program
  .command("show")
  .description("Compile with `cargo +nightly rustc <args> -- -Zprint-type-sizes` and report type sizes")
  .argument("[cargoArgs...]", "arguments passed to cargo rustc")
  .option("-c, --config <path>", "YAML config file")
  .option("-i, --input <path>", "parse saved compiler output instead of running cargo (- for stdin)")
  .option("-t, --touch <path>", `file touched to force a rebuild (default: ${DEFAULT_TOUCH_PATH})`)
  .option("--toolchain <name>", "rustup toolchain (default: nightly)")
  .addOption(new Option("-f, --format <format>", "output format (default: html)").choices([...OUTPUT_FORMATS]))
  .option("-o, --output <path>", `output file (html default: ${DEFAULT_HTML_OUTPUT})`)
  .addOption(new Option("--sort <key>", "sort order (default: source)").choices([...SORT_KEYS]))
  .option("--sort-size", "sort by size, same as --sort size")
  .option("--reverse", "reverse the sort order")
  .option("--filter <text>", "only types whose name contains text")
  .option("--min-size <bytes>", "only types of at least this size", parseNonNegativeInt)
  .option("--indent-unit <width>", "spaces per nesting level (default: 4)", parsePositiveInt)
  .option("--strict-indent", "fail on indentation that is not a multiple of the indent unit")
  .option("--stop-on-malformed", "discard everything after a malformed type header")
  .allowUnknownOption()
  .action(async (cargoArgs: string[], opts: ShowCliOptions) => runShow(cargoArgs, opts));

program
  .command("doctor")
  .description("Check runtime dependencies")
  .action(async () => {
    const hasCargo = await commandExists("cargo");
    const hasRustup = await commandExists("rustup");
    process.stdout.write(`Node: ${process.version}\n`);
    process.stdout.write(`cargo: ${hasCargo ? "found" : "not found"}\n`);
    process.stdout.write(`rustup: ${hasRustup ? "found" : "not found"}\n`);
    if (!hasRustup) {
      process.stdout.write("tip: install rustup and a nightly toolchain, or pass --input with saved output\n");
    }
  });

const argv = normalizeArgvForDefaultShow([...process.argv]);
program.parseAsync(argv).catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exit(1);
});
