// tests/helpers/memory-sink.ts
import { IPartSink, IPartSinkFactory } from '../../src/interfaces/PartSink';

export class MemoryPartSinkFactory implements IPartSinkFactory {
  readonly outputs = new Map<number, string>();
  readonly opened: number[] = [];
  readonly closed: number[] = [];
  existing: string[] = [];

  async open(partIndex: number): Promise<IPartSink> {
    this.opened.push(partIndex);
    this.outputs.set(partIndex, '');
    return {
      target: `memory:${partIndex}`,
      write: async (chunk: string) => {
        this.outputs.set(partIndex, (this.outputs.get(partIndex) ?? '') + chunk);
      },
      close: async () => {
        this.closed.push(partIndex);
      }
    };
  }

  async existingTargets(): Promise<string[]> {
    return this.existing;
  }
}
