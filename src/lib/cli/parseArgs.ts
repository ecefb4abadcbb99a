/**
 * Argument parsing for the scripts/ entry points.
 *
 * Each parser returns { ok: true, args } or { ok: false, error } and never
 * exits; the scripts decide how to report. Values not given on the command
 * line stay undefined so env defaults can apply.
 */

import { EXPORT_FORMATS, type ExportFormat } from "@/lib/export/derivedOwnership";
import {
  MERGE_POLICIES,
  MISSING_PERCENTAGE_POLICIES,
  type MergePolicy,
  type MissingPercentagePolicy,
} from "@/lib/ownership/types";

export type ParseResult<T> = { ok: true; args: T } | { ok: false; error: string };

export interface DiscoverArgs {
  seeds: string[];
  depth?: number;
  synthetic: boolean;
  policy?: MergePolicy;
  missing?: MissingPercentagePolicy;
  concurrency?: number;
  memory: boolean;
  help: boolean;
}

export interface ImportArgs {
  krs: string[];
  mock: boolean;
  help: boolean;
}

export interface ExportArgs {
  seedId?: string;
  format: ExportFormat;
  out?: string;
  help: boolean;
}

class ArgError extends Error {}

function takeValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ArgError(`${flag} requires a value`);
  }
  return value;
}

function takeInt(argv: string[], i: number, flag: string): number {
  const raw = takeValue(argv, i, flag);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ArgError(`Invalid ${flag} value: ${raw}`);
  }
  return value;
}

function takeChoice<T extends string>(argv: string[], i: number, flag: string, choices: readonly T[]): T {
  const raw = takeValue(argv, i, flag);
  const match = choices.find((c) => c === raw);
  if (match === undefined) {
    throw new ArgError(`Invalid ${flag} value: ${raw} (expected ${choices.join("|")})`);
  }
  return match;
}

function run<T>(parse: () => T): ParseResult<T> {
  try {
    return { ok: true, args: parse() };
  } catch (err) {
    if (err instanceof ArgError) return { ok: false, error: err.message };
    throw err;
  }
}

export function parseDiscoverArgs(argv: string[]): ParseResult<DiscoverArgs> {
  return run(() => {
    const args: DiscoverArgs = { seeds: [], synthetic: false, memory: false, help: false };
    for (let i = 0; i < argv.length; i++) {
      const flag = argv[i];
      switch (flag) {
        case "--help":
        case "-h":
          args.help = true;
          break;
        case "--krs":
          args.seeds.push(takeValue(argv, i, flag));
          i++;
          break;
        case "--depth":
          args.depth = takeInt(argv, i, flag);
          i++;
          break;
        case "--policy":
          args.policy = takeChoice(argv, i, flag, MERGE_POLICIES);
          i++;
          break;
        case "--missing":
          args.missing = takeChoice(argv, i, flag, MISSING_PERCENTAGE_POLICIES);
          i++;
          break;
        case "--concurrency":
          args.concurrency = takeInt(argv, i, flag);
          i++;
          break;
        case "--synthetic":
          args.synthetic = true;
          break;
        case "--memory":
          args.memory = true;
          break;
        default:
          throw new ArgError(`Unknown argument: ${flag}`);
      }
    }
    if (!args.help && args.seeds.length === 0 && !args.synthetic) {
      throw new ArgError("Provide at least one --krs or --synthetic");
    }
    return args;
  });
}

export function parseImportArgs(argv: string[]): ParseResult<ImportArgs> {
  return run(() => {
    const args: ImportArgs = { krs: [], mock: false, help: false };
    for (let i = 0; i < argv.length; i++) {
      const flag = argv[i];
      if (flag === "--help" || flag === "-h") {
        args.help = true;
      } else if (flag === "--krs") {
        args.krs.push(takeValue(argv, i, flag));
        i++;
      } else if (flag === "--mock") {
        args.mock = true;
      } else {
        throw new ArgError(`Unknown argument: ${flag}`);
      }
    }
    if (!args.help && args.krs.length === 0) throw new ArgError("--krs is required");
    return args;
  });
}

export function parseExportArgs(argv: string[]): ParseResult<ExportArgs> {
  return run(() => {
    const args: ExportArgs = { format: "json", help: false };
    for (let i = 0; i < argv.length; i++) {
      const flag = argv[i];
      if (flag === "--help" || flag === "-h") {
        args.help = true;
      } else if (flag === "--krs") {
        args.seedId = takeValue(argv, i, flag);
        i++;
      } else if (flag === "--format") {
        args.format = takeChoice(argv, i, flag, EXPORT_FORMATS);
        i++;
      } else if (flag === "--out") {
        args.out = takeValue(argv, i, flag);
        i++;
      } else {
        throw new ArgError(`Unknown argument: ${flag}`);
      }
    }
    return args;
  });
}
