import { ErrorCode, FanState, RecordedLayer } from '../types';
import { SplitConfig } from '../config';
import { formatNumber as n, requireAbsolute } from '../state/axis';
import { ErrorHandler } from '../utils/error-handler';
import { airPrimeTemplate, bedPrimeTemplate } from './templates';

const TRAVEL_FEED_RATE = 5000;
const BREAK_FEED_RATE = 4500;
// Height to lift to after a full home, before priming
const HOME_CLEARANCE_Z = 10;

export interface StartPosition {
  x: number;
  y: number;
  z: number;
}

/**
 * Renders the gcode wrapped around each part: the begin (resume) script, the
 * script inserted after a part's first layer and the end (pause) script.
 * Every method is a pure function of the layer snapshots it is given.
 */
export class ScaffoldSynthesizer {
  constructor(private config: SplitConfig, private layerHeight?: number) {}

  /**
   * Where the layer effectively starts: the endpoint of its first move when
   * that move does not extrude, otherwise the position at layer entry.
   */
  startPosition(layer: RecordedLayer): StartPosition {
    const where = `layer ${layer.index}`;
    const position = layer.firstMove?.kind === 'travel' ? layer.firstMove.position : layer.entry;
    return {
      x: requireAbsolute(position.x, 'X', where),
      y: requireAbsolute(position.y, 'Y', where),
      z: requireAbsolute(position.z, 'Z', where)
    };
  }

  /** Z the firmware is told the head is at when a later part resumes. */
  inheritedZ(layer: RecordedLayer, part: number): number {
    let z = requireAbsolute(layer.entry.z, 'Z', `layer ${layer.index}`) + this.config.breakHop;
    if (this.config.zCompression) {
      if (this.layerHeight === undefined) {
        throw ErrorHandler.createError(
          ErrorCode.MissingLayerHeight,
          'Z compression needs the layer height (;Layer height:) to be declared',
          { layer: layer.index, part }
        );
      }
      z += this.config.zCompression * this.layerHeight * part;
    }
    return z;
  }

  wantsIroning(): boolean {
    return this.config.iron;
  }

  canIron(layer?: RecordedLayer): layer is RecordedLayer {
    return layer !== undefined && layer.canIron && layer.ironingPath.length > 0;
  }

  begin(layer: RecordedLayer, part: number, previousLayer?: RecordedLayer): string {
    const { config } = this;
    const { entry } = layer;
    const where = `layer ${layer.index}`;

    const bedTemp = entry.bedTemp;
    if (bedTemp === undefined) {
      throw ErrorHandler.createError(
        ErrorCode.MissingTemperature,
        `No bed temperature found at ${where}`,
        { layer: layer.index, part }
      );
    }
    const nozzleTemp = this.resumeNozzleTemp(layer, part);

    const start = this.startPosition(layer);
    const e = requireAbsolute(entry.e, 'E', where);
    const retraction = e - requireAbsolute(entry.eMax, 'E max', where);

    const approachZ = start.z + config.breakHop;
    if (approachZ >= config.maxZ) {
      throw ErrorHandler.createError(
        ErrorCode.HeightExceeded,
        `Approach height ${n(approachZ)} reaches the maximum ${n(config.maxZ)} at ${where}`,
        { layer: layer.index, part }
      );
    }

    const inheritedZ = part > 0 ? this.inheritedZ(layer, part) : undefined;
    if (inheritedZ !== undefined && inheritedZ > config.maxZ) {
      throw ErrorHandler.createError(
        ErrorCode.HeightExceeded,
        `Inherited Z ${n(inheritedZ)} exceeds the maximum ${n(config.maxZ)} at ${where}`,
        { layer: layer.index, part }
      );
    }

    const lines: string[] = [
      `; Resuming part #${part} at layer #${layer.index}` +
        (inheritedZ === undefined ? '' : ` inherited Z: ${n(inheritedZ)}`),
      `; Layer starts with bed: ${n(bedTemp)} nozzle: ${n(nozzleTemp)} fan: ${describeFan(entry.fan)}`,
      `; Layer starts at X:${n(start.x)} Y:${n(start.y)} Z:${n(start.z)} E:${n(e)} retract:${n(retraction)}`,
      '',
      'M413 S0 ; power loss recovery off',
      'M220 S100 ; reset feed rate',
      'M221 S100 ; reset flow rate',
      ''
    ];

    if (part === 0 || config.reheatBed) {
      lines.push(
        `M140 S${n(bedTemp)} ; bed temp`,
        'M105 ; report temp',
        `M190 S${n(bedTemp)} ; wait bed temp`,
        ''
      );
    }

    if (inheritedZ === undefined) {
      lines.push('G28 ; home all axes');
    } else {
      // Homing Z would drive the nozzle into the print; tell the firmware where Z is instead
      lines.push(
        `G92 Z${n(inheritedZ)} ; set Z without homing`,
        'M211 S0 ; disable software endstops',
        'G90 ; absolute XYZ',
        'G28 X0 Y0 ; home X and Y only'
      );
    }

    lines.push(
      'M420 S1 ; enable mesh leveling',
      '',
      'G90 ; absolute XYZ',
      'M82 ; absolute E',
      `G92 E${n(-config.breakRetract)} ; extruder is retracted by the end code`,
      '',
      'G0 X0 Y0 ; keep clear of the print'
    );
    if (part === 0) {
      lines.push(`G0 Z${HOME_CLEARANCE_Z} ; lift off the bed`);
    }
    lines.push('');

    if (part === 0 || config.primeMode === 'bed') {
      const offsetX = config.shiftBedPrep ? part * config.bedPrepShift : 0;
      lines.push(...bedPrimeTemplate(offsetX, nozzleTemp, config.primeRetract));
    } else {
      lines.push(...airPrimeTemplate(nozzleTemp, config.primeRetract));
    }

    lines.push(
      '',
      '; approach from above',
      'M220 S100 ; reset feed rate',
      `G0 Z${n(approachZ)} F${TRAVEL_FEED_RATE}`,
      `G0 X${n(start.x)} Y${n(start.y)} Z${n(approachZ)} F${TRAVEL_FEED_RATE}`,
      ''
    );

    if (part > 0 && config.iron && this.canIron(previousLayer)) {
      lines.push(...this.ironing(previousLayer, part));
    } else {
      lines.push(`G0 X${n(start.x)} Y${n(start.y)} Z${n(start.z)} F${TRAVEL_FEED_RATE}`);
    }

    lines.push(
      'M220 S100 ; reset feed rate',
      '',
      '; restore E and retraction',
      `G1 E${n(retraction)} F1500`,
      `G92 E${n(e)}`,
      `G1 E${n(e)} F1800`,
      ''
    );

    if (entry.fan) {
      lines.push(entry.fan.kind === 'off' ? 'M107 ; restore fan' : `M106 S${n(entry.fan.value)} ; restore fan`);
    }
    if (part > 0) {
      if (config.continuationFlowRate !== 100) {
        lines.push(`M221 S${n(config.continuationFlowRate)} ; continuation flow rate`);
      }
      // Slower first layer bonds better to the cold top of the previous part
      lines.push(`M220 S${n(config.continuationFeedRate)} ; slow feed rate for first layer`);
    }

    return lines.join('\n') + '\n';
  }

  /** Re-trace of a layer at low feed rate to warm it up before printing on it. */
  ironing(layer: RecordedLayer, part: number): string[] {
    return [
      '; ironing starts',
      'M107 ; fan off',
      `M109 S${n(this.resumeNozzleTemp(layer, part))} ; wait nozzle temp`,
      ...layer.ironingPath,
      '; ironing ends'
    ];
  }

  afterFirstLayer(layer: RecordedLayer): string {
    // Undo the continuation feed and flow and any higher priming temperature
    const nozzleTemp = layer.exit.nozzleTemp;
    if (nozzleTemp === undefined) {
      throw ErrorHandler.createError(
        ErrorCode.MissingTemperature,
        `No nozzle temperature found at the end of layer ${layer.index}`,
        { layer: layer.index }
      );
    }
    return [
      'M220 S100 ; reset feed rate',
      'M221 S100 ; reset flow rate',
      `M104 S${n(nozzleTemp)} ; nozzle temp`
    ].join('\n') + '\n';
  }

  end(layer: RecordedLayer, part: number, totalParts: number): string {
    const { config } = this;
    let z = requireAbsolute(layer.exit.z, 'final Z', `the end of layer ${layer.index}`);
    if (z > config.maxZ) {
      throw ErrorHandler.createError(
        ErrorCode.HeightExceeded,
        `Z ${n(z)} at the end of layer ${layer.index} is already above the maximum ${n(config.maxZ)}`,
        { layer: layer.index, part }
      );
    }
    z += config.breakHop;
    if (z > config.maxZ) {
      // The next part resumes from this height, so only the last part may hop less
      if (part !== totalParts - 1) {
        throw ErrorHandler.createError(
          ErrorCode.HeightExceeded,
          `Cannot hop to ${n(z)} above the maximum ${n(config.maxZ)} after part ${part}`,
          { layer: layer.index, part }
        );
      }
      z = config.maxZ;
    }

    return [
      'G91 ; relative XYZ',
      'M83 ; relative E',
      '; retract filament',
      `G1 E${n(-config.breakRetract)} F${BREAK_FEED_RATE}`,
      'M82 ; absolute E',
      'G90 ; absolute XYZ',
      `G0 Z${n(z)} F${BREAK_FEED_RATE}`,
      '; move to a safe rest position',
      `G0 X0 Y${n(config.presentY)}`,
      'M106 S0 ; turn off fan',
      'M104 S0 ; turn off hotend',
      'M140 S0 ; turn off bed',
      'M18 S60 ; disable steppers after one minute',
      'M300 S440 P200 ; beep'
    ].join('\n') + '\n';
  }

  private resumeNozzleTemp(layer: RecordedLayer, part: number): number {
    const { entry } = layer;
    const temp = this.config.resumeNozzleTemp === 'initial' ? entry.initialNozzleTemp : entry.nozzleTemp;
    if (temp === undefined) {
      throw ErrorHandler.createError(
        ErrorCode.MissingTemperature,
        `No nozzle temperature found at layer ${layer.index}`,
        { layer: layer.index, part }
      );
    }
    return temp;
  }
}

function describeFan(fan?: FanState): string {
  if (!fan) return 'unknown';
  return fan.kind === 'off' ? 'off' : n(fan.value);
}
