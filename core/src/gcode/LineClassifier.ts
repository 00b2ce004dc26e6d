import { ClassifiedLine, GCodeField } from './types';

const LAYER_MARKER = /^;LAYER:\s*(\d+)\s*$/;
const LAYER_COUNT = /^;LAYER_COUNT:\s*(\d+)\s*$/;
const LAYER_HEIGHT = /^;Layer height:\s*(\d+(?:\.\d*)?|\.\d+)\s*$/;
const END_MARKER = /^;[ -]+end code begin/;
const NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)$/;

/**
 * Turn one raw line into a marker or a command token. Pure: no state is
 * consulted, so the same line always classifies the same way.
 */
export function classifyLine(line: string): ClassifiedLine {
  const text = line.trim();

  let match = LAYER_MARKER.exec(text);
  if (match) {
    return { kind: 'layer', index: parseInt(match[1], 10) };
  }
  match = LAYER_COUNT.exec(text);
  if (match) {
    return { kind: 'layerCount', count: parseInt(match[1], 10) };
  }
  match = LAYER_HEIGHT.exec(text);
  if (match) {
    return { kind: 'layerHeight', height: parseFloat(match[1]) };
  }
  if (END_MARKER.test(text)) {
    return { kind: 'end' };
  }

  const semicolonIndex = text.indexOf(';');
  const code = semicolonIndex === -1 ? text : text.substring(0, semicolonIndex).trim();
  const comment = semicolonIndex === -1 ? undefined : text.substring(semicolonIndex + 1);

  const words = code ? code.split(/\s+/) : [];
  const [mnemonic = '', ...rest] = words;

  return {
    kind: 'command',
    mnemonic: mnemonic.toUpperCase(),
    fields: rest.map(parseField),
    comment
  };
}

export function parseField(word: string): GCodeField {
  const letter = word[0].toUpperCase();
  const raw = word.substring(1);
  return NUMBER.test(raw) ? { letter, raw, value: parseFloat(raw) } : { letter, raw };
}
