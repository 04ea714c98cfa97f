#!/usr/bin/env node
/**
 * CLI command to render the method and variables blocks of a Dakota input
 * file from a JSON description.
 *
 * Usage:
 *   npx tsx src/cli/render-blocks.ts --input examples/sampling.json
 *   npm run render-blocks -- --input examples/sampling.json
 *
 * Options:
 *   --input <path>      JSON file with "method" and "variables" sections
 *   --method-only       Render only the method block
 *   --variables-only    Render only the variables block
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Blocks rendered
 *   1 - Invalid input or configuration
 */

import { existsSync, readFileSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { ConfigError, validateConfig } from "../config/index.js";
import { getLogger } from "../logging/index.js";
import { loadBlocks, loadMethodBlock, loadVariablesBlock } from "../blocks/loader.js";
import { BlockValidationError } from "../blocks/validation.js";

const logger = getLogger("cli");

export type BlockSelection = "all" | "method" | "variables";

// ============================================================
// Rendering
// ============================================================

/**
 * Render the selected blocks of a parsed JSON description.
 * Each block ends with a newline; blocks are separated by a blank line.
 *
 * @throws BlockValidationError if any block is invalid
 */
export function renderBlocks(input: unknown, selection: BlockSelection = "all"): string {
  switch (selection) {
    case "method": {
      const section = isObject(input) && "method" in input ? input.method : undefined;
      return terminate(loadMethodBlock(section).render());
    }
    case "variables": {
      const section = isObject(input) && "variables" in input ? input.variables : undefined;
      return terminate(loadVariablesBlock(section).render());
    }
    case "all": {
      const { method, variables } = loadBlocks(input);
      return terminate(method.render()) + "\n" + terminate(variables.render());
    }
  }
}

function terminate(block: string): string {
  return block.endsWith("\n") ? block : block + "\n";
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Read and parse a JSON description.
 * @throws Error if the file is missing or not valid JSON
 */
export function readBlocksFile(path: string): unknown {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new Error(`Input file not found: ${fullPath}`);
  }
  try {
    return JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new Error(
      `Failed to parse ${fullPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: render-blocks --input <path> [options]

Options:
  --input <path>      JSON file with "method" and "variables" sections
  --method-only       Render only the method block
  --variables-only    Render only the variables block
  -h, --help          Show this help message
`;

function parseCliArgs(): { input: string | undefined; selection: BlockSelection } {
  const { values } = parseArgs({
    options: {
      input: { type: "string" },
      "method-only": { type: "boolean", default: false },
      "variables-only": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (values["method-only"] && values["variables-only"]) {
    console.error("--method-only and --variables-only cannot be combined");
    process.exit(1);
  }

  const selection: BlockSelection = values["method-only"]
    ? "method"
    : values["variables-only"]
      ? "variables"
      : "all";
  return { input: values.input, selection };
}

function main(): void {
  const { input, selection } = parseCliArgs();

  if (input === undefined) {
    console.error("Missing required option --input");
    console.log(HELP);
    process.exit(1);
  }

  try {
    validateConfig();
    const description = readBlocksFile(input);
    process.stdout.write(renderBlocks(description, selection));
    logger.info("Rendered blocks", { input, selection });
  } catch (err) {
    if (err instanceof BlockValidationError) {
      console.error(err.format());
      process.exit(1);
    }
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message });
      process.exit(1);
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
/**
 * True when this module is the entry point, including through the
 * `render-blocks` bin link, which has no file extension.
 */
export function isEntryPoint(argv1: string | undefined): boolean {
  if (argv1 === undefined || !existsSync(argv1)) {
    return false;
  }
  return realpathSync(argv1) === realpathSync(fileURLToPath(import.meta.url));
}

const isDirectExecution = isEntryPoint(process.argv[1]);

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}
