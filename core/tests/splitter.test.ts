// tests/splitter.test.ts
import fs from 'fs';
import os from 'os';
import path from 'path';
import { GCodeSplitter } from '../src/controller/GCodeSplitter';
import { parseConfig, SplitConfigInput } from '../src/config';
import { ErrorCode, IPartEvent } from '../src/types';
import { buildProgram, buildProgramText, defaultLayer, ProgramOptions } from './fixtures/gcode-fixtures';
import { MemoryPartSinkFactory } from './helpers/memory-sink';
import { extractBodyLines, partText } from './helpers/part-text';

const splitter = (config: SplitConfigInput = {}) => new GCodeSplitter(parseConfig(config));

const layerLines = (from: number, to: number, layer = defaultLayer): string[] => {
  const lines: string[] = [];
  for (let index = from; index <= to; index++) {
    lines.push(...layer(index));
  }
  return lines;
};

const assembleText = async (config: SplitConfigInput, program: ProgramOptions) => {
  const instance = splitter(config);
  const recorded = await instance.readText(buildProgramText(program));
  return instance.assemble(recorded, instance.plan(recorded), 'model.gcode');
};

describe('GCodeSplitter', () => {
  describe('in memory', () => {
    test('should split ten layers into two parts of five', async () => {
      const parts = await assembleText({ parts: 2 }, { layerCount: 10 });

      expect(parts.map(part => [part.index, part.firstLayer, part.lastLayer])).toEqual([
        [0, 0, 4],
        [1, 5, 9]
      ]);

      const [first, second] = parts.map(part => partText(part).split('\n'));
      expect(first[0]).toBe('; =========== begin model.gcode part 0 ===========');
      expect(first).toContain('G28 ; home all axes');
      expect(second).toContain('G92 Z11 ; set Z without homing');
      expect(second).toContain('G28 X0 Y0 ; home X and Y only');
      expect(second).not.toContain('G28 ; home all axes');
      expect(second).toContain('; LAYER 0 (in part) 5 (globally)');
      expect(second).toContain('; LAYER 4 (in part) 9 (globally)');
    });

    test('should keep every layer line, in order, across the parts', async () => {
      const parts = await assembleText({ parts: 3 }, { layerCount: 10 });
      const bodies = parts.map(part => extractBodyLines(partText(part)));

      expect(bodies).toEqual([layerLines(0, 3), layerLines(4, 7), layerLines(8, 9)]);
    });

    test('should close every part with the end script', async () => {
      const parts = await assembleText({ parts: 2 }, { layerCount: 10 });
      for (const part of parts) {
        expect(part.chunks[part.chunks.length - 2]).toBe('; =========== end code ===========\n');
        expect(part.chunks[part.chunks.length - 1].endsWith('M300 S440 P200 ; beep\n')).toBe(true);
      }
      // Layer 9 ends at Z 2
      expect(partText(parts[1]).split('\n')).toContain('G0 Z12 F4500');
    });

    test('should start a part from the endpoint of its opening travel move', async () => {
      const parts = await assembleText({ parts: 2 }, {
        layerCount: 10,
        layer: index => index === 5 ? ['G0 X33 Y44 Z1.2'] : defaultLayer(index)
      });
      const second = partText(parts[1]).split('\n');

      expect(second).toContain('; Layer starts at X:33 Y:44 Z:1.2 E:9 retract:-1');
      expect(second).toContain('G0 X33 Y44 Z1.2 F5000');
      expect(extractBodyLines(partText(parts[1]))[0]).toBe('G0 X33 Y44 Z1.2');
    });

    test('should add parts to respect the layer cap', async () => {
      const parts = await assembleText({ parts: 2, maxLayersPerPart: 3 }, { layerCount: 10 });

      expect(parts.map(part => [part.firstLayer, part.lastLayer])).toEqual([
        [0, 2],
        [3, 5],
        [6, 8],
        [9, 9]
      ]);
    });

    test('should leave out the layers before the start layer', async () => {
      const parts = await assembleText({ parts: 2, startLayer: 2 }, { layerCount: 10 });

      expect(parts.map(part => [part.index, part.firstLayer, part.lastLayer])).toEqual([
        [0, 2, 5],
        [1, 6, 9]
      ]);
      expect(extractBodyLines(partText(parts[0]))).toEqual(layerLines(2, 5));
      expect(partText(parts[0]).split('\n')).toContain('G28 ; home all axes');
    });

    test('should report what was read', async () => {
      const instance = splitter();
      const summaries: unknown[] = [];
      instance.on('programRead', summary => summaries.push(summary));

      await instance.readText(buildProgramText({ layerCount: 4 }));

      expect(summaries).toEqual([{
        layerCount: 4,
        layerHeight: 0.2,
        printMinX: { value: 40, layer: 0, line: 'G0 F6000 X40 Y50 Z0.2' }
      }]);
    });

    test('should warn when the layer before a part cannot be ironed', async () => {
      const instance = splitter({ parts: 2, iron: true });
      const warnings: string[] = [];
      instance.on('warning', message => warnings.push(message));

      const recorded = await instance.readText(buildProgramText({
        layerCount: 10,
        layer: index => index === 4 ? [...defaultLayer(4), 'G91', 'G0 X0', 'G90'] : defaultLayer(index)
      }));
      instance.assemble(recorded, instance.plan(recorded), 'model.gcode');

      expect(warnings).toEqual(['Cannot iron layer 4 before part 1; approaching directly']);
    });

    test('should reject logical coordinate systems', async () => {
      const text = buildProgramText({
        layerCount: 10,
        layer: index => index === 3 ? ['G92 X0', ...defaultLayer(3)] : defaultLayer(index)
      });

      await expect(splitter().readText(text)).rejects.toMatchObject({ code: ErrorCode.LogicalCoordinates });
    });

    test('should reject overrides inside layers unless told to ignore them', async () => {
      const text = buildProgramText({
        layerCount: 3,
        layer: index => index === 1 ? ['M220 S50', ...defaultLayer(1)] : defaultLayer(index)
      });

      await expect(splitter().readText(text)).rejects.toMatchObject({ code: ErrorCode.OverrideInLayer });
      await expect(splitter({ overridePolicy: 'ignore' }).readText(text)).resolves.toMatchObject({ layerCount: 3 });
    });

    test('should refuse to prime on the bed when the print is too close to it', async () => {
      const text = buildProgramText({ layerCount: 3 });

      await expect(splitter({ primeMode: 'bed', printHeadXSide: 40 }).readText(text)).rejects.toMatchObject({
        code: ErrorCode.PrimeClearance,
        details: { layer: 0 }
      });
      await expect(splitter({ primeMode: 'bed', printHeadXSide: 39 }).readText(text)).resolves.toMatchObject({
        layerCount: 3
      });
      await expect(splitter({ printHeadXSide: 40 }).readText(text)).resolves.toMatchObject({ layerCount: 3 });
    });
  });

  describe('split', () => {
    let dir: string;
    let input: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gcode-parts-'));
      input = path.join(dir, 'model.gcode');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('should write one file per part next to the input', async () => {
      fs.writeFileSync(input, buildProgramText({ layerCount: 10 }));

      const result = await splitter({ parts: 2 }).split(input);

      expect(result).toEqual({
        layerCount: 10,
        totalParts: 2,
        written: true,
        parts: [
          { index: 0, totalParts: 2, firstLayer: 0, lastLayer: 4, target: path.join(dir, 'model.0.gcode') },
          { index: 1, totalParts: 2, firstLayer: 5, lastLayer: 9, target: path.join(dir, 'model.1.gcode') }
        ]
      });
      const second = fs.readFileSync(path.join(dir, 'model.1.gcode'), 'utf8');
      expect(second.startsWith('; =========== begin model.gcode part 1 ===========\n')).toBe(true);
      expect(extractBodyLines(second)).toEqual(layerLines(5, 9));
    });

    test('should write parts one at a time and report each', async () => {
      fs.writeFileSync(input, buildProgramText({ layerCount: 10 }));
      const sinks = new MemoryPartSinkFactory();
      const instance = splitter({ parts: 2 });
      const events: string[] = [];
      instance.on('partStarted', (part: IPartEvent) => events.push(`started ${part.index} ${part.target}`));
      instance.on('partWritten', (part: IPartEvent) => events.push(`written ${part.index} ${part.target}`));

      await instance.split(input, { sinkFactory: sinks });

      expect(events).toEqual([
        'started 0 memory:0',
        'written 0 memory:0',
        'started 1 memory:1',
        'written 1 memory:1'
      ]);
      expect(sinks.opened).toEqual([0, 1]);
      expect(sinks.closed).toEqual([0, 1]);
      expect(extractBodyLines(sinks.outputs.get(0) ?? '')).toEqual(layerLines(0, 4));
    });

    test('should read CRLF input like LF input', async () => {
      fs.writeFileSync(input, buildProgram({ layerCount: 4 }).join('\r\n') + '\r\n');
      const sinks = new MemoryPartSinkFactory();

      await splitter({ parts: 2 }).split(input, { sinkFactory: sinks });

      expect(extractBodyLines(sinks.outputs.get(1) ?? '')).toEqual(layerLines(2, 3));
    });

    test('should write nothing when the overwrite is declined', async () => {
      fs.writeFileSync(input, buildProgramText({ layerCount: 10 }));
      const sinks = new MemoryPartSinkFactory();
      sinks.existing = ['memory:0'];
      const asked: string[][] = [];

      const result = await splitter({ parts: 2 }).split(input, {
        sinkFactory: sinks,
        confirmOverwrite: targets => {
          asked.push(targets);
          return false;
        }
      });

      expect(asked).toEqual([['memory:0']]);
      expect(result.written).toBe(false);
      expect(result.parts).toEqual([]);
      expect(sinks.opened).toEqual([]);
    });

    test('should not ask when no part file exists yet', async () => {
      fs.writeFileSync(input, buildProgramText({ layerCount: 4 }));
      const confirm = jest.fn(() => false);

      const result = await splitter({ parts: 2 }).split(input, { confirmOverwrite: confirm });

      expect(confirm).not.toHaveBeenCalled();
      expect(result.written).toBe(true);
    });

    test('should create no file when the input is rejected', async () => {
      fs.writeFileSync(input, buildProgramText({
        layerCount: 10,
        layer: index => index === 3 ? ['G92 X0', ...defaultLayer(3)] : defaultLayer(index)
      }));

      await expect(splitter({ parts: 2 }).split(input)).rejects.toMatchObject({
        code: ErrorCode.LogicalCoordinates,
        details: { layer: 3 }
      });
      expect(fs.readdirSync(dir)).toEqual(['model.gcode']);
    });

    test('should create no file when a scaffold cannot be rendered', async () => {
      fs.writeFileSync(input, buildProgramText({ layerCount: 10 }));

      await expect(splitter({ parts: 2, maxZ: 11 }).split(input)).rejects.toMatchObject({
        code: ErrorCode.HeightExceeded
      });
      expect(fs.readdirSync(dir)).toEqual(['model.gcode']);
    });

    test('should fail on a missing input file', async () => {
      await expect(splitter().split(path.join(dir, 'missing.gcode'))).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });
});
