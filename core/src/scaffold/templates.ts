import { formatNumber as n } from '../state/axis';

// Height of the priming lines drawn on the bed
const PRIME_Z = 0.28;

function heatNozzle(nozzleTemp: number): string[] {
  return [
    `M104 S${n(nozzleTemp)} ; nozzle temp`,
    'M105 ; report temp',
    `M109 S${n(nozzleTemp)} ; wait nozzle temp`
  ];
}

/**
 * Two priming lines and a short wipe near the front left corner. `offsetX`
 * moves the whole pattern so consecutive parts use fresh bed area.
 */
export function bedPrimeTemplate(offsetX: number, nozzleTemp: number, retract: number): string[] {
  const z = n(PRIME_Z);
  return [
    '; priming on bed',
    `G0 X${n(offsetX + 0.2)} Y10 Z10 F5000 ; move to start position`,
    '',
    ...heatNozzle(nozzleTemp),
    '',
    `G1 X${n(offsetX + 0.2)} Y20 Z${z} F1500 E0 ; diagonal down, undo end code retract`,
    `G1 X${n(offsetX + 0.2)} Y160 Z${z} F1500 E15 ; draw the first line`,
    `G1 X${n(offsetX + 0.4)} Y160 Z${z} F5000 ; move to the side a little`,
    `G1 X${n(offsetX + 0.4)} Y40 Z${z} F1500 E30 ; draw the second line`,
    '',
    'G92 E0 ; reset extruder position',
    `G1 E${n(-retract)} F600 ; retract a bit`,
    `G0 X${n(offsetX)} Y40 Z${z} F1000 ; wipe across`,
    `G0 X${n(offsetX + 0.5)} Y60 Z${z} F1000 ; more wipe`,
    `G0 X${n(offsetX)} Y80 Z${z} F1000 ; more wipe`
  ];
}

// Never goes down to the bed; the operator removes the primed strand by hand
export function airPrimeTemplate(nozzleTemp: number, retract: number): string[] {
  return [
    '; priming in air',
    'G0 X0 Y0 F5000 ; move to the front corner',
    '',
    ...heatNozzle(nozzleTemp),
    '',
    'G1 E30 F500 ; undo end code retract and prime',
    'M106 ; full fan speed',
    'G4 S2 ; dwell',
    'M300 S440 P200 ; beep',
    'M0 CLEANME ; wait for the primed filament to be removed',
    'M107 ; fan off',
    'G92 E0 ; reset extruder position',
    `G1 E${n(-retract)} F600 ; retract a bit`
  ];
}
