#!/usr/bin/env node
/**
 * vidIQ キーワードリサーチ CLI
 *
 * 使い方:
 *   vidiq-keywords <keyword>
 *   vidiq-keywords matching|related|questions <keyword> [--limit N]
 *   vidiq-keywords batch <keyword1> <keyword2> ...
 *   vidiq-keywords export <keyword> [--out path] [--separate --dir d] [--limit N]
 */

import * as dotenv from "dotenv";
import { ENV_VARS } from "../config";
import { InvalidArgumentError, getErrorMessage } from "../errors";
import { exportCombined, exportSeparate } from "../export/csv-exporter";
import { logger, parseLogLevel } from "../logger";
import { VidiqClient, createVidiqClient } from "../vidiq/client";
import { extractListField } from "../vidiq/normalizer";
import {
  formatAnalysisSummary,
  formatBatchSummary,
  formatKeywordList,
} from "./format";

export const USAGE = [
  "Usage: vidiq-keywords <keyword>",
  "       vidiq-keywords matching|related|questions <keyword> [--limit N]",
  "       vidiq-keywords batch <keyword1> <keyword2> ...",
  "       vidiq-keywords export <keyword> [--out path] [--separate --dir d] [--limit N]",
  `Make sure ${ENV_VARS.TOKEN} environment variable is set.`,
];

export interface CliDeps {
  env?: Record<string, string | undefined>;
  createClient?: (env: Record<string, string | undefined>) => VidiqClient;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

interface ParsedArgs {
  positionals: string[];
  limit?: number;
  out?: string;
  dir?: string;
  separate: boolean;
}

const COMMANDS = ["matching", "related", "questions", "batch", "export"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

// =============================================================================
// 引数解析
// =============================================================================

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new InvalidArgumentError(`Missing value for ${flag}`);
  }
  return value;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError(`--limit must be a positive integer: ${value}`);
  }
  return limit;
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], separate: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--limit":
        parsed.limit = parseLimit(takeValue(argv, i, arg));
        i++;
        break;
      case "--out":
        parsed.out = takeValue(argv, i, arg);
        i++;
        break;
      case "--dir":
        parsed.dir = takeValue(argv, i, arg);
        i++;
        break;
      case "--separate":
        parsed.separate = true;
        break;
      default:
        if (arg.startsWith("--")) {
          throw new InvalidArgumentError(`Unknown option: ${arg}`);
        }
        parsed.positionals.push(arg);
    }
  }

  return parsed;
}

// =============================================================================
// コマンド実行
// =============================================================================

async function runCommand(
  client: VidiqClient,
  command: Command | undefined,
  args: ParsedArgs,
  out: (line: string) => void
): Promise<void> {
  const keyword = args.positionals.join(" ");

  switch (command) {
    case "matching": {
      const result = await client.getMatchingKeywords(keyword, { limit: args.limit });
      formatKeywordList("Matching keywords", result, extractListField(result.data, "permutations")).forEach(out);
      return;
    }
    case "related": {
      const result = await client.getRelatedKeywords(keyword);
      const items = args.limit === undefined ? result.data : result.data.slice(0, args.limit);
      formatKeywordList("Related keywords", result, items).forEach(out);
      return;
    }
    case "questions": {
      const result = await client.getQuestions(keyword, { limit: args.limit });
      formatKeywordList("Questions", result, extractListField(result.data, "questions")).forEach(out);
      return;
    }
    case "batch": {
      if (args.positionals.length === 0) {
        throw new InvalidArgumentError("batch requires at least one keyword");
      }
      const results = await client.analyzeKeywords(args.positionals);
      formatBatchSummary(results).forEach(out);
      return;
    }
    case "export": {
      if (args.separate) {
        const paths = await exportSeparate(client, keyword, { outputDir: args.dir, limit: args.limit });
        for (const [type, path] of Object.entries(paths)) {
          out(`Wrote ${type}: ${path}`);
        }
      } else {
        const path = await exportCombined(client, keyword, { outputPath: args.out, limit: args.limit });
        out(`Wrote ${path}`);
      }
      return;
    }
    default: {
      const result = await client.analyzeKeyword(keyword);
      formatAnalysisSummary(result).forEach(out);
    }
  }
}

/**
 * CLI を実行して終了コードを返す
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const createClient =
    deps.createClient ??
    ((clientEnv: Record<string, string | undefined>) => createVidiqClient({ env: clientEnv }));

  if (argv.length === 0) {
    USAGE.forEach(out);
    return 1;
  }

  try {
    const first = argv[0];
    const command = isCommand(first) ? first : undefined;
    const args = parseCliArgs(command ? argv.slice(1) : argv);

    if (command !== "batch" && args.positionals.length === 0) {
      throw new InvalidArgumentError("Keyword cannot be empty");
    }

    if (env[ENV_VARS.LOG_LEVEL] !== undefined) {
      logger.setLevel(parseLogLevel(env[ENV_VARS.LOG_LEVEL]));
    }

    const client = createClient(env);
    await runCommand(client, command, args, out);
    return 0;
  } catch (error) {
    err(`Error: ${getErrorMessage(error)}`);
    return 1;
  }
}

/**
 * エントリーポイント（終了コードを process.exitCode に設定する）
 */
export function main(argv: string[], deps: CliDeps = {}): Promise<void> {
  const err = deps.err ?? ((line: string) => console.error(line));

  return runCli(argv, deps)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      err(`Error: ${getErrorMessage(error)}`);
      process.exitCode = 1;
    });
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2));
}
