import { AssembledPart, RecordedLayer, RecordedProgram } from '../types';
import { END_OF_PRINT, PartitionPlan } from '../planning/PartitionPlanner';
import { ScaffoldSynthesizer } from '../scaffold/ScaffoldSynthesizer';

export interface AssembleHooks {
  onWarning?: (message: string) => void;
}

/**
 * Lay the recorded layers out into parts. Every scaffold is rendered here,
 * before anything is written, so a synthesis failure leaves no output behind.
 */
export function assembleParts(
  program: RecordedProgram,
  plan: PartitionPlan,
  synthesizer: ScaffoldSynthesizer,
  sourceName: string,
  hooks: AssembleHooks = {}
): AssembledPart[] {
  const parts: AssembledPart[] = [];
  let current: AssembledPart | null = null;
  let layerInPart = 0;

  const entries: Array<RecordedLayer | typeof END_OF_PRINT> = [...program.layers, END_OF_PRINT];
  for (const entry of entries) {
    const assignment = plan.partOf(entry === END_OF_PRINT ? END_OF_PRINT : entry.index);
    if (assignment === 'excluded') continue;

    if (!current || assignment !== current.index) {
      if (current) {
        const last = program.layers[current.lastLayer];
        current.chunks.push(
          '; =========== end code ===========\n',
          synthesizer.end(last, current.index, plan.totalParts)
        );
        parts.push(current);
        current = null;
      }
      if (entry === END_OF_PRINT) break;

      const previous = entry.index > 0 ? program.layers[entry.index - 1] : undefined;
      if (assignment > 0 && synthesizer.wantsIroning() && !synthesizer.canIron(previous)) {
        hooks.onWarning?.(
          `Cannot iron layer ${entry.index - 1} before part ${assignment}; approaching directly`
        );
      }
      current = {
        index: assignment,
        firstLayer: entry.index,
        lastLayer: entry.index,
        chunks: [
          `; =========== begin ${sourceName} part ${assignment} ===========\n`,
          synthesizer.begin(entry, assignment, previous),
          '; =========== start code ends ===========\n'
        ]
      };
      layerInPart = 0;
    }

    if (entry === END_OF_PRINT) break;

    current.lastLayer = entry.index;
    current.chunks.push(`; LAYER ${layerInPart} (in part) ${entry.index} (globally)\n`);
    for (const line of entry.lines) {
      current.chunks.push(line + '\n');
    }
    if (layerInPart === 0) {
      current.chunks.push(
        '; =========== after 1st layer code ===========\n',
        synthesizer.afterFirstLayer(entry),
        '; =========== after 1st layer code ends ===========\n'
      );
    }
    layerInPart++;
  }

  return parts;
}
