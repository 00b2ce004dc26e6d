import EventEmitter from 'eventemitter3';
import fs from 'fs';
import path from 'path';
import readline from 'readline';
import { once } from 'events';
import { AssembledPart, ErrorCode, PartRange, RecordedProgram, SplitterEvents } from '../types';
import { DEFAULT_CONFIG, SplitConfig } from '../config';
import { LayerRecorder } from '../layers/LayerRecorder';
import { PartitionPlan, planPartition } from '../planning/PartitionPlanner';
import { ScaffoldSynthesizer } from '../scaffold/ScaffoldSynthesizer';
import { assembleParts } from '../output/PartAssembler';
import { writeParts } from '../output/PartWriter';
import { FilePartSinkFactory } from '../output/FilePartSink';
import { IPartSinkFactory } from '../interfaces/PartSink';
import { ErrorHandler } from '../utils/error-handler';
import { formatNumber } from '../state/axis';

export interface SplitOptions {
  sinkFactory?: IPartSinkFactory;
  /** Asked with the targets that already exist; returning false aborts before writing */
  confirmOverwrite?: (targets: string[]) => boolean | Promise<boolean>;
}

export interface SplitResult {
  layerCount: number;
  totalParts: number;
  parts: Array<PartRange & { target: string }>;
  /** False when the overwrite confirmation was declined */
  written: boolean;
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Drives the whole split: record layers from the input, plan the parts,
 * render every scaffold and write one part at a time. Progress is reported
 * through events rather than logged.
 */
export class GCodeSplitter extends EventEmitter<SplitterEvents> {
  constructor(private config: SplitConfig = DEFAULT_CONFIG) {
    super();
  }

  getConfig(): SplitConfig {
    return this.config;
  }

  async readProgram(lines: Iterable<string> | AsyncIterable<string>): Promise<RecordedProgram> {
    const recorder = new LayerRecorder({ overridePolicy: this.config.overridePolicy });
    for await (const line of lines) {
      recorder.accept(line);
    }
    const program = recorder.finish();
    this.checkPrimeClearance(program);

    this.emit('programRead', {
      layerCount: program.layerCount,
      layerHeight: program.layerHeight,
      printMinX: program.printMinX
    });
    return program;
  }

  readText(text: string): Promise<RecordedProgram> {
    return this.readProgram(splitLines(text));
  }

  async readFile(inputPath: string): Promise<RecordedProgram> {
    const input = fs.createReadStream(inputPath, { encoding: 'utf8' });
    try {
      await once(input, 'open');
      const reader = readline.createInterface({ input, crlfDelay: Infinity });
      try {
        return await this.readProgram(reader);
      } finally {
        reader.close();
      }
    } finally {
      input.destroy();
    }
  }

  plan(program: RecordedProgram): PartitionPlan {
    return planPartition({
      layerCount: program.layerCount,
      parts: this.config.parts,
      maxLayersPerPart: this.config.maxLayersPerPart,
      startLayer: this.config.startLayer
    });
  }

  assemble(program: RecordedProgram, plan: PartitionPlan, sourceName: string): AssembledPart[] {
    const synthesizer = new ScaffoldSynthesizer(this.config, program.layerHeight);
    return assembleParts(program, plan, synthesizer, sourceName, {
      onWarning: message => this.emit('warning', message)
    });
  }

  async split(inputPath: string, options: SplitOptions = {}): Promise<SplitResult> {
    const factory = options.sinkFactory ?? new FilePartSinkFactory(inputPath);

    const program = await this.readFile(inputPath);
    const plan = this.plan(program);
    const parts = this.assemble(program, plan, path.basename(inputPath));

    const result: SplitResult = {
      layerCount: program.layerCount,
      totalParts: plan.totalParts,
      parts: [],
      written: false
    };

    if (options.confirmOverwrite && factory.existingTargets) {
      const existing = await factory.existingTargets(parts.map(part => part.index));
      if (existing.length > 0 && !(await options.confirmOverwrite(existing))) {
        return result;
      }
    }

    const event = (part: AssembledPart, target: string) => ({
      index: part.index,
      totalParts: plan.totalParts,
      firstLayer: part.firstLayer,
      lastLayer: part.lastLayer,
      target
    });
    await writeParts(parts, factory, {
      onPartStarted: (part, target) => this.emit('partStarted', event(part, target)),
      onPartWritten: (part, target) => {
        this.emit('partWritten', event(part, target));
        result.parts.push(event(part, target));
      }
    });
    result.written = true;
    return result;
  }

  private checkPrimeClearance(program: RecordedProgram): void {
    const { printMinX } = program;
    if (this.config.primeMode !== 'bed' || !printMinX) return;
    if (printMinX.value <= this.config.printHeadXSide) {
      throw ErrorHandler.createError(
        ErrorCode.PrimeClearance,
        `The print reaches X ${formatNumber(printMinX.value)} at layer ${printMinX.layer} (${printMinX.line}), ` +
          `too close for the print head (${formatNumber(this.config.printHeadXSide)} mm) to prime on the bed`,
        { layer: printMinX.layer }
      );
    }
  }
}
