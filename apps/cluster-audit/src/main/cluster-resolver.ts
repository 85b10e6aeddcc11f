import type { ClusteringResult, ImageList, SelectionSet } from "../ipc/contracts.js";
import { ClusterIndexError, NotFoundError } from "./errors.js";

const collectIndices = (
  clusteringResult: ClusteringResult,
  imageCount: number,
  labelsOfInterest: readonly string[]
): Set<number> => {
  const indices = new Set<number>();
  for (const label of labelsOfInterest) {
    const cluster = clusteringResult.get(label);
    if (!cluster) {
      const known = [...clusteringResult.keys()].join(", ");
      throw new NotFoundError("cluster", label, "missing", `known labels: ${known || "none"}`);
    }
    for (const index of cluster.imageIndices) {
      if (!Number.isInteger(index) || index < 0 || index >= imageCount) {
        throw new ClusterIndexError(label, index, imageCount);
      }
      indices.add(index);
    }
  }
  return indices;
};

/**
 * Images contained in the clusters of interest, in image list order.
 * Overlapping clusters contribute each image once.
 */
export const resolveSelection = (
  clusteringResult: ClusteringResult,
  imageList: ImageList,
  labelsOfInterest: readonly string[]
): SelectionSet => {
  const indices = collectIndices(clusteringResult, imageList.length, labelsOfInterest);
  return imageList.filter((_, index) => indices.has(index));
};
