/**
 * Command-line argument parsing for the dep-footprint CLI.
 *
 * Positionals are one or more manifest paths (each may be a comma-separated
 * list) followed by the ecosystem tag.
 */

import path from "node:path";
import { UsageError } from "./errors";
import { DatabaseSource } from "./types";

export const USAGE = "Usage: dep-footprint [options] <file[,file...]> <python|node>";

export interface CliOptions {
  help: boolean;
  manifests: string[];
  ecosystem: string;
  source?: DatabaseSource;
  githubToken?: string;
  ignoreFile?: string;
  output: string;
  concurrency?: number;
}

function requireValue(args: readonly string[], index: number, flag: string, expected: string): string {
  const value = args[index];
  if (value === undefined || value === "" || value.startsWith("-")) {
    throw new UsageError(`Missing ${flag} value. Expected ${expected}.`);
  }
  return value;
}

export function parseArgs(args: readonly string[], cwd: string = process.cwd()): CliOptions {
  const positional: string[] = [];
  const options: CliOptions = {
    help: false,
    manifests: [],
    ecosystem: "",
    output: path.join(cwd, "analysis_output.json"),
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { ...options, help: true };
    } else if (arg === "--database-source") {
      const value = args[++i];
      if (value !== "osv" && value !== "ghsa") {
        throw new UsageError(`Invalid --database-source value: ${value}. Must be 'osv' or 'ghsa'.`);
      }
      options.source = value;
    } else if (arg === "--github-token") {
      options.githubToken = requireValue(args, ++i, arg, "a token");
    } else if (arg === "--ignore-file") {
      options.ignoreFile = requireValue(args, ++i, arg, "a file path");
    } else if (arg === "--output") {
      options.output = requireValue(args, ++i, arg, "a file path");
    } else if (arg === "--concurrency") {
      const raw = requireValue(args, ++i, arg, "a positive integer");
      const concurrency = parseInt(raw, 10);
      if (!Number.isFinite(concurrency) || concurrency < 1) {
        throw new UsageError(`Invalid --concurrency value: ${raw}. Must be a positive integer.`);
      }
      options.concurrency = concurrency;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  if (positional.length < 2) {
    throw new UsageError(USAGE);
  }

  options.ecosystem = positional[positional.length - 1];
  options.manifests = positional
    .slice(0, -1)
    .flatMap((p) => p.split(","))
    .map((p) => p.trim())
    .filter(Boolean);

  return options;
}
