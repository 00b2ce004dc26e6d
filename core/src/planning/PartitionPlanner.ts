import { ErrorCode, PartRange } from '../types';
import { ErrorHandler } from '../utils/error-handler';

export interface PartitionOptions {
  layerCount: number;
  /** Target number of parts; more are produced when maxLayersPerPart requires it */
  parts: number;
  maxLayersPerPart?: number;
  /** Layers before this index are left out of every part */
  startLayer: number;
}

export type PartAssignment = number | 'excluded';

/** Stands for the end-of-print marker after the last layer. */
export const END_OF_PRINT = Symbol('endOfPrint');

export interface PartitionPlan {
  totalParts: number;
  /** Layers per part; only the last part may hold fewer */
  layersPerPart: number;
  partOf(layer: number | typeof END_OF_PRINT): PartAssignment;
  ranges(): PartRange[];
}

export function planPartition(options: PartitionOptions): PartitionPlan {
  const { layerCount, parts, maxLayersPerPart, startLayer } = options;
  const span = layerCount - startLayer;

  if (!Number.isInteger(parts) || parts < 1) {
    throw ErrorHandler.createError(ErrorCode.InvalidConfig, `Part count must be a positive integer, got ${parts}`);
  }
  if (span < 1) {
    throw ErrorHandler.createError(
      ErrorCode.InvalidConfig,
      `Start layer ${startLayer} leaves no layers to print out of ${layerCount}`
    );
  }

  let nominal = span / parts;
  if (maxLayersPerPart !== undefined && maxLayersPerPart > 0 && nominal > maxLayersPerPart) {
    // Respect the cap but keep the parts as even as possible
    nominal = span / Math.ceil(span / maxLayersPerPart);
  }
  const layersPerPart = Math.ceil(nominal);
  const totalParts = Math.ceil(span / layersPerPart);

  const partOf = (layer: number | typeof END_OF_PRINT): PartAssignment => {
    if (layer === END_OF_PRINT) {
      return totalParts;
    }
    if (layer < startLayer) {
      return 'excluded';
    }
    return Math.min(Math.floor((layer - startLayer) / layersPerPart), totalParts - 1);
  };

  const ranges = (): PartRange[] =>
    Array.from({ length: totalParts }, (_, index) => ({
      index,
      firstLayer: startLayer + index * layersPerPart,
      lastLayer: Math.min(startLayer + (index + 1) * layersPerPart, layerCount) - 1,
      totalParts
    }));

  return { totalParts, layersPerPart, partOf, ranges };
}
