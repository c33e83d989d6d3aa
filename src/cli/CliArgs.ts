/**
 * Command-line argument parsing for the conform tool.
 */

import { ValidationError } from '../core/errors';
import type { ProbeKind } from '../config/PipelineConfig';
import { reportFormatOf } from '../export/FileReportWriter';

export interface CliOptions {
  xytech: string;
  baselight: string;
  /** Video to classify against; report runs only with `output` too */
  process?: string;
  output?: string;
  fps?: number;
  store?: string;
  probe?: ProbeKind;
  reset: boolean;
  help: boolean;
}

export const USAGE = `Usage: conform --xytech <file> --baselight <file> [options]

Options:
  --xytech <file>      Facility manifest (required)
  --baselight <file>   Grading-tool frame export (required)
  --process <video>    Video to check frame ranges against
  --output <file>      Report path (.html or .csv); needs --process
  --fps <n>            Frame rate (default 24)
  --store <file>       Record store file (default .conform-store.json)
  --probe <kind>       Duration probe: ffprobe | mediabunny
  --reset              Clear the record store before ingesting
  -h, --help           Show this help`;

const VALUE_FLAGS = new Set(['--xytech', '--baselight', '--process', '--output', '--outputXLS', '--fps', '--store', '--probe']);

function parseFps(raw: string): number {
  const fps = Number(raw);
  if (!Number.isInteger(fps) || fps < 1) {
    throw new ValidationError(`--fps must be a positive integer, got "${raw}"`);
  }
  return fps;
}

function parseProbe(raw: string): ProbeKind {
  if (raw === 'ffprobe' || raw === 'mediabunny') return raw;
  throw new ValidationError(`--probe must be "ffprobe" or "mediabunny", got "${raw}"`);
}

/**
 * Parse `argv` (without the node and script entries). Accepts both
 * `--flag value` and `--flag=value`. `--outputXLS` is an alias of `--output`.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = new Map<string, string>();
  let reset = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '-h' || arg === '--help') {
      help = true;
      continue;
    }
    if (arg === '--reset') {
      reset = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!VALUE_FLAGS.has(flag)) {
      throw new ValidationError(`Unknown argument "${arg}"`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '' || value.startsWith('--')) {
      throw new ValidationError(`Missing value for ${flag}`);
    }
    values.set(flag === '--outputXLS' ? '--output' : flag, value);
  }

  if (help) {
    return { xytech: '', baselight: '', reset, help };
  }

  const xytech = values.get('--xytech');
  const baselight = values.get('--baselight');
  if (!xytech) throw new ValidationError('--xytech is required');
  if (!baselight) throw new ValidationError('--baselight is required');

  const fps = values.get('--fps');
  const probe = values.get('--probe');
  const output = values.get('--output');
  if (output !== undefined) reportFormatOf(output);

  return {
    xytech,
    baselight,
    process: values.get('--process'),
    output,
    fps: fps === undefined ? undefined : parseFps(fps),
    store: values.get('--store'),
    probe: probe === undefined ? undefined : parseProbe(probe),
    reset,
    help,
  };
}
