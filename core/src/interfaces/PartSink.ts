export interface IPartSink {
  /** Name shown in progress messages, e.g. the output file path */
  readonly target: string;
  write(chunk: string): Promise<void>;
  close(): Promise<void>;
}

export interface IPartSinkFactory {
  open(partIndex: number): Promise<IPartSink>;
  /** Targets that would be replaced by writing the given parts */
  existingTargets?(partIndices: number[]): Promise<string[]>;
}
