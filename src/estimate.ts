import { BASE_IMAGE_SIZES, PACKAGE_OVERHEAD_RATIO } from "./config";
import { DockerSizeEstimate, Ecosystem, PackageInfo } from "./types";

/**
 * Estimated image size per variant: base image + package bytes + 15% overhead.
 */
export function estimateDockerSizes(
  packages: readonly Pick<PackageInfo, "size">[],
  ecosystem: Ecosystem,
  baseSizes: Record<Ecosystem, DockerSizeEstimate> = BASE_IMAGE_SIZES,
): DockerSizeEstimate {
  const packagesSize = packages.reduce((total, pkg) => total + pkg.size, 0);
  const overhead = Math.floor(packagesSize * PACKAGE_OVERHEAD_RATIO);
  const base = baseSizes[ecosystem];

  return {
    full: base.full + packagesSize + overhead,
    slim: base.slim + packagesSize + overhead,
    alpine: base.alpine + packagesSize + overhead,
  };
}
