#!/usr/bin/env node
/**
 * CLI entrypoint for the dep-footprint tool.
 *
 * Usage:
 *   dep-footprint [options] <file[,file...]> <python|node>
 *
 * Options:
 *   --database-source <osv|ghsa>  Query single advisory DB (default: both)
 *   --github-token <token>        GitHub token (required for GHSA)
 *   --help                        Show help message
 *
 * Ignore file:
 *   Create a .footprintignore file with vulnerability IDs (one per line) to suppress.
 *
 * For development: use `npm run dev` (no build needed).
 */

import fs from "node:fs";
import { analyze, assertEcosystem } from "./analyze";
import { CliOptions, parseArgs, USAGE } from "./args";
import { CacheStats } from "./cache";
import { createSecurityAudit } from "./clients";
import { loadConfig } from "./config";
import { UsageError } from "./errors";
import { loadIgnoreList } from "./ignore";
import { formatBytes, generateReport, Report } from "./report";
import { RegistryResolver } from "./resolver";

function printHelp() {
  console.log(`
${USAGE}

Options:
  --database-source <osv|ghsa>  Query single advisory DB only (default: both)
  --github-token <token>        GitHub token for GHSA (or set GITHUB_TOKEN)
  --ignore-file <path>          Path to ignore file (default: .footprintignore)
  --output <path>               Result file (default: analysis_output.json)
  --concurrency <n>             Registry lookups in flight (default: 8)
  --help                        Show this help message

Examples:
  dep-footprint requirements.txt python
  dep-footprint api/requirements.txt,worker/requirements.txt python
  dep-footprint package.json node --database-source osv
`);
  process.exit(0);
}

function fatal(message: string): never {
  console.error(message);
  process.exit(1);
}

function readArgs(): CliOptions {
  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.help) printHelp();
    return options;
  } catch (err) {
    if (err instanceof UsageError) fatal(err.message);
    throw err;
  }
}

async function main() {
  const startTime = Date.now();
  const options = readArgs();
  const config = loadConfig();
  const ecosystem = assertEcosystem(options.ecosystem);

  const githubToken = options.githubToken || config.githubToken;
  if (options.source === "ghsa" && !githubToken) {
    fatal("❌ GitHub GraphQL API requires authentication.\n   Use --github-token <token> or set GITHUB_TOKEN env var.");
  }

  console.log(`Analyzing: ${options.manifests.join(", ")} (${ecosystem})`);

  const { audit, sources } = createSecurityAudit({
    source: options.source,
    githubToken,
    timeoutMs: config.timeoutMs,
  });
  const ignored = loadIgnoreList(options.manifests[0] ?? "", options.ignoreFile);

  const run: { resolver?: RegistryResolver } = {};
  const analysis = await analyze(options.manifests, ecosystem, {
    audit,
    ignoredAdvisories: ignored,
    concurrency: options.concurrency ?? config.concurrency,
    timeoutMs: config.timeoutMs,
    onResolver: (resolver) => {
      run.resolver = resolver;
    },
  });

  const durationMs = Date.now() - startTime;
  const report = generateReport(analysis, {
    manifests: options.manifests,
    ecosystem,
    sources,
    timestamp: new Date().toISOString(),
    durationMs,
    ignoredCount: run.resolver?.ignoredAdvisoryCount ?? 0,
    cache: run.resolver?.cache.stats(),
  });

  fs.writeFileSync(options.output, JSON.stringify(report, null, 2));
  console.log(`Analysis details saved to: ${options.output}`);

  printSummary(report);

  const elapsed = (durationMs / 1000).toFixed(2);
  console.log(`\n⏱️  Completed in ${elapsed} seconds`);
}

/**
 * Print summary of the report to the console.
 */
function printSummary(report: Report) {
  const { packages, dockerSizes, conflicts, metadata } = report;

  console.log("\n📦 Dependency Overview:\n");
  const nameWidth = Math.max(4, ...packages.map((p) => p.name.length));
  console.log(`  ${"Name".padEnd(nameWidth)}  ${"Size".padStart(10)}  Paid`);
  for (const pkg of packages) {
    const size = formatBytes(pkg.size).padStart(10);
    console.log(`  ${pkg.name.padEnd(nameWidth)}  ${size}  ${pkg.isPaid ? "Yes" : "No"}`);
  }

  console.log(
    `\n🐳 Docker Sizes Estimate (full/slim/alpine): ` +
      `${formatBytes(dockerSizes.full)} / ${formatBytes(dockerSizes.slim)} / ${formatBytes(dockerSizes.alpine)}`,
  );

  if (conflicts.length === 0) {
    console.log("\n✅ No version conflicts detected.");
  } else {
    console.log("\n⚠️ Conflicts Detected:");
    for (const c of conflicts) {
      console.log(`  ${c.name}: Version conflict between ${c.firstVersionSeen || "(any)"} and ${c.conflictingVersion || "(any)"}`);
    }
  }

  if (metadata.cache) {
    printCacheStats(metadata.cache);
  }
  if (metadata.ignoredCount) {
    console.log(`   Advisories ignored: ${metadata.ignoredCount}`);
  }
}

function printCacheStats(stats: CacheStats) {
  console.log(`\n🗄️  Registry lookups: ${stats.fetches} fetched, ${stats.hits} served from cache`);
}

main().catch((err: unknown) => {
  const error = err instanceof Error ? err : new Error(String(err));
  console.error("\n🚨 Analysis failed:", error.message);
  if (process.env.DEBUG) console.error(error.stack);
  process.exit(1);
});
