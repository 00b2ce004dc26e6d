import fs from 'fs';
import path from 'path';
import { once } from 'events';
import { finished } from 'stream/promises';
import { IPartSink, IPartSinkFactory } from '../interfaces/PartSink';

/** `model.gcode` → `model.2.gcode`; the part index goes before the extension. */
export function partFileName(inputPath: string, partIndex: number): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.format({ dir, name: `${name}.${partIndex}`, ext });
}

class FilePartSink implements IPartSink {
  private constructor(public readonly target: string, private stream: fs.WriteStream) {}

  static async create(target: string): Promise<FilePartSink> {
    const stream = fs.createWriteStream(target, { encoding: 'utf8' });
    // Rejects with the open error (missing directory, permissions)
    await once(stream, 'open');
    return new FilePartSink(target, stream);
  }

  async write(chunk: string): Promise<void> {
    if (!this.stream.write(chunk)) {
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }
}

export class FilePartSinkFactory implements IPartSinkFactory {
  constructor(private inputPath: string) {}

  open(partIndex: number): Promise<IPartSink> {
    return FilePartSink.create(partFileName(this.inputPath, partIndex));
  }

  async existingTargets(partIndices: number[]): Promise<string[]> {
    return partIndices
      .map(index => partFileName(this.inputPath, index))
      .filter(target => fs.existsSync(target));
  }
}
