#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import readlineSync from 'readline-sync';
import { GCodeSplitter, loadConfig, Logger, ErrorHandler, SplitConfig, formatNumber } from './index';

interface CliOptions {
  config?: string;
  parts?: number;
  maxLayers?: number;
  startLayer?: number;
  retract?: number;
  hop?: number;
  presentY?: number;
  maxZ?: number;
  headXSide?: number;
  prime?: 'bed' | 'air';
  shiftBedPrep?: boolean;
  initialTemp?: boolean;
  reheatBed?: boolean;
  iron?: boolean;
  zCompression?: number;
  flowRate?: number;
  feedRate?: number;
  allowOverrides?: boolean;
  dryRun?: boolean;
  force?: boolean;
  quiet?: boolean;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parsePrimeMode(value: string): 'bed' | 'air' {
  if (value !== 'bed' && value !== 'air') {
    throw new InvalidArgumentError('Expected "bed" or "air".');
  }
  return value;
}

function toConfigOverrides(options: CliOptions): Partial<SplitConfig> {
  return {
    parts: options.parts,
    maxLayersPerPart: options.maxLayers,
    startLayer: options.startLayer,
    breakRetract: options.retract,
    breakHop: options.hop,
    presentY: options.presentY,
    maxZ: options.maxZ,
    printHeadXSide: options.headXSide,
    primeMode: options.prime,
    shiftBedPrep: options.shiftBedPrep,
    resumeNozzleTemp: options.initialTemp ? 'initial' : undefined,
    reheatBed: options.reheatBed,
    iron: options.iron,
    zCompression: options.zCompression,
    continuationFlowRate: options.flowRate,
    continuationFeedRate: options.feedRate,
    overridePolicy: options.allowOverrides ? 'ignore' : undefined
  };
}

const program = new Command();

program
  .name('gcode-parts')
  .description('Split sliced gcode into parts that can be printed in separate sessions')
  .version('0.1.0')
  .argument('<file>', 'gcode file produced by the slicer')
  .option('-c, --config <path>', 'JSON configuration file (flags override it)')
  .option('-p, --parts <n>', 'number of parts to split into', parseNumber)
  .option('--max-layers <n>', 'maximum layers in one part', parseNumber)
  .option('--start-layer <n>', 'first layer to output (0-indexed)', parseNumber)
  .option('--retract <mm>', 'filament retraction between parts', parseNumber)
  .option('--hop <mm>', 'Z lift between parts', parseNumber)
  .option('--present-y <mm>', 'Y coordinate to present the print at', parseNumber)
  .option('--max-z <mm>', 'maximum build height', parseNumber)
  .option('--head-x-side <mm>', 'space the print head takes along X with the nozzle at 0', parseNumber)
  .option('--prime <mode>', 'nozzle priming for later parts: bed or air', parsePrimeMode)
  .option('--shift-bed-prep', 'shift the bed priming lines for every part')
  .option('--initial-temp', 'resume with the first nozzle temperature of the print')
  .option('--reheat-bed', 'reheat the bed before every part')
  .option('--iron', 're-trace the last layer of the previous part before resuming')
  .option('--z-compression <ratio>', 'layer height ratio taken off Z at every continuation', parseNumber)
  .option('--flow-rate <percent>', 'flow rate for the first layer of a continuation', parseNumber)
  .option('--feed-rate <percent>', 'feed rate for the first layer of a continuation', parseNumber)
  .option('--allow-overrides', 'ignore M220/M221 inside layers instead of failing')
  .option('--dry-run', 'read and plan only, write nothing')
  .option('-f, --force', 'overwrite existing part files without asking')
  .option('-q, --quiet', 'only print warnings and errors')
  .action(async (file: string, options: CliOptions) => {
    const logger = new Logger('gcode-parts', { quiet: options.quiet });

    try {
      const config = await loadConfig(options.config, toConfigOverrides(options));
      const splitter = new GCodeSplitter(config);

      splitter.on('programRead', summary => {
        logger.info(`Read ${summary.layerCount} layers` +
          (summary.layerHeight === undefined ? '' : ` of ${formatNumber(summary.layerHeight)} mm`));
        if (summary.printMinX) {
          logger.debug(`Minimum X ${formatNumber(summary.printMinX.value)} at layer ${summary.printMinX.layer}`);
        }
      });
      splitter.on('warning', message => logger.warn(message));
      splitter.on('partStarted', part => logger.debug(`Writing part #${part.index} to ${part.target}`));
      splitter.on('partWritten', part =>
        logger.success(`Part #${part.index}/${part.totalParts - 1}: layers ${part.firstLayer}-${part.lastLayer} → ${part.target}`)
      );

      if (options.dryRun) {
        const recorded = await splitter.readFile(file);
        const plan = splitter.plan(recorded);
        // Render the scaffolds too, so every synthesis error shows up
        splitter.assemble(recorded, plan, file);
        logger.table([
          ['part', 'first layer', 'last layer', 'layers'],
          ...plan.ranges().map(range => [
            String(range.index),
            String(range.firstLayer),
            String(range.lastLayer),
            String(range.lastLayer - range.firstLayer + 1)
          ])
        ]);
        return;
      }

      const result = await splitter.split(file, {
        confirmOverwrite: options.force
          ? undefined
          : targets => readlineSync.keyInYNStrict(`Overwrite ${targets.join(', ')}?`)
      });
      if (!result.written) {
        logger.warn('Nothing written.');
        return;
      }
      logger.success(`Done: ${result.totalParts} parts from ${result.layerCount} layers`);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error(ErrorHandler.formatError(error));
      process.exitCode = 1;
    }
  });

program.parseAsync().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
