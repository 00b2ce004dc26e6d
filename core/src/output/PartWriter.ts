import { AssembledPart } from '../types';
import { IPartSinkFactory } from '../interfaces/PartSink';

export interface WriteHooks {
  onPartStarted?: (part: AssembledPart, target: string) => void;
  onPartWritten?: (part: AssembledPart, target: string) => void;
}

/** Write parts in order; only one sink is open at a time and each is always closed. */
export async function writeParts(
  parts: AssembledPart[],
  factory: IPartSinkFactory,
  hooks: WriteHooks = {}
): Promise<string[]> {
  const targets: string[] = [];
  for (const part of parts) {
    const sink = await factory.open(part.index);
    hooks.onPartStarted?.(part, sink.target);
    try {
      for (const chunk of part.chunks) {
        await sink.write(chunk);
      }
    } finally {
      await sink.close();
    }
    targets.push(sink.target);
    hooks.onPartWritten?.(part, sink.target);
  }
  return targets;
}
