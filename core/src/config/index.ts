import fs from 'fs/promises';
import { z } from 'zod';
import { ErrorCode } from '../types';
import { ErrorHandler } from '../utils/error-handler';

export const splitConfigSchema = z.object({
  // ----- partitioning -----
  parts: z.number().int().min(1).default(3),
  maxLayersPerPart: z.number().int().min(1).optional(),
  startLayer: z.number().int().min(0).default(0),

  // ----- pause between parts -----
  breakRetract: z.number().min(0).default(3), // mm of filament pulled back at a break
  breakHop: z.number().min(0).default(10), // mm of Z lift at a break
  presentY: z.number().min(0).default(220), // Y to present the print at
  maxZ: z.number().positive().default(250), // build height limit

  // ----- resuming -----
  // Space taken by the print head along X when the nozzle is at 0
  printHeadXSide: z.number().min(0).default(30),
  primeMode: z.enum(['bed', 'air']).default('air'),
  shiftBedPrep: z.boolean().default(false),
  bedPrepShift: z.number().min(0).default(5),
  primeRetract: z.number().min(0).default(1),
  resumeNozzleTemp: z.enum(['captured', 'initial']).default('captured'),
  reheatBed: z.boolean().default(false),
  iron: z.boolean().default(false),
  // Ratio of layer height taken off Z at every continuation
  zCompression: z.number().min(0).default(0),
  continuationFlowRate: z.number().positive().default(100),
  continuationFeedRate: z.number().positive().default(35),

  // ----- input -----
  overridePolicy: z.enum(['reject', 'ignore']).default('reject')
}).strict();

export type SplitConfig = z.infer<typeof splitConfigSchema>;
export type SplitConfigInput = z.input<typeof splitConfigSchema>;

export function parseConfig(input: unknown): SplitConfig {
  const result = splitConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw ErrorHandler.createError(
      ErrorCode.InvalidConfig,
      `Invalid configuration: ${issues.join('; ')}`,
      { issues }
    );
  }
  return result.data;
}

export const DEFAULT_CONFIG: SplitConfig = parseConfig({});

/**
 * Read a JSON configuration file and apply overrides on top of it. Keys set
 * to undefined in the overrides leave the file's value in place.
 */
export async function loadConfig(
  path?: string,
  overrides: Partial<SplitConfigInput> = {}
): Promise<SplitConfig> {
  let fromFile: unknown = {};
  if (path) {
    const text = await fs.readFile(path, 'utf8');
    try {
      fromFile = JSON.parse(text);
    } catch (error) {
      throw ErrorHandler.createError(
        ErrorCode.InvalidConfig,
        `Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
    throw ErrorHandler.createError(ErrorCode.InvalidConfig, `Configuration file ${path} must hold a JSON object`);
  }

  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return parseConfig({ ...fromFile, ...defined });
}
