export { analyze, assertEcosystem, loadRequirements } from "./analyze";
export type { AnalyzeOptions } from "./analyze";
export { MetadataCache } from "./cache";
export type { CacheStats } from "./cache";
export * from "./clients";
export { findConflicts } from "./conflicts";
export * from "./errors";
export { estimateDockerSizes } from "./estimate";
export { loadIgnoreList, filterIgnored } from "./ignore";
export { parse, normalizeName } from "./parsers";
export { generateReport, formatBytes } from "./report";
export type { Report, PackageFinding, ReportMetadata } from "./report";
export { RegistryResolver } from "./resolver";
export type { ResolverOptions } from "./resolver";
export * from "./types";
