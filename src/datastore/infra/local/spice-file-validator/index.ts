import { z } from 'zod';
import type { ResultAsync } from 'neverthrow';
import type { FileReadPort } from '../../../ports/fs.port.js';
import type {
  SpiceFileComponents,
  SpiceFileValidator,
  SpiceKernelType,
} from '../../../ports/spice-file-validator.port.js';
import { baseName, parentSegment } from '../../../core/path-handlers/attributes.js';
import { dateFromDayOfYear, parseCompactDate } from '../../../core/dates.js';
import type { ReferenceTableError } from '../reference-table/index.js';
import { readJsonTable } from '../reference-table/index.js';

/**
 * One kernel type. A `version` group in `regex` makes the type versioned;
 * dates are read from `start`/`end` (YYYYMMDD) or `startYear`+`startDoy` /
 * `endYear`+`endDoy`.
 */
export interface SpiceKernelDefinition extends SpiceKernelType {
  readonly regex: RegExp;
}

function compileKernelPattern(pattern: string): RegExp | undefined {
  try {
    return new RegExp(pattern, 'd');
  } catch {
    return undefined;
  }
}

const KernelSchema = z
  .object({
    type: z.string().min(1),
    subfolder: z.string().min(1),
    datePartitioned: z.boolean().default(false),
    pattern: z.string().min(1),
  })
  .transform((kernel, ctx): SpiceKernelDefinition => {
    const regex = compileKernelPattern(kernel.pattern);
    if (!regex) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: `Pattern for '${kernel.type}' is not a valid regex`,
      });
      return z.NEVER;
    }
    if (kernel.datePartitioned && !/\(\?<start(?:Year)?>/.test(kernel.pattern)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['datePartitioned'],
        message: `Pattern for '${kernel.type}' must capture a start date to be date-partitioned`,
      });
      return z.NEVER;
    }
    return {
      type: kernel.type,
      subfolder: kernel.subfolder,
      datePartitioned: kernel.datePartitioned,
      versioned: kernel.pattern.includes('(?<version>'),
      regex,
    };
  });

const KernelTableFileSchema = z.object({ kernels: z.array(KernelSchema).min(1) });

type Groups = Partial<Record<string, string>>;

type DateField = { readonly ok: true; readonly date: Date | undefined } | { readonly ok: false };

function readDate(groups: Groups, prefix: 'start' | 'end'): DateField {
  const compact = groups[prefix];
  if (compact !== undefined) {
    const date = parseCompactDate(compact);
    return date ? { ok: true, date } : { ok: false };
  }

  const year = groups[`${prefix}Year`];
  const dayOfYear = groups[`${prefix}Doy`];
  if (year === undefined || dayOfYear === undefined) return { ok: true, date: undefined };

  const date = dateFromDayOfYear(Number(year), Number(dayOfYear));
  return date ? { ok: true, date } : { ok: false };
}

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? '' : name.slice(dot + 1);
}

/** Table-driven validator: the first kernel type whose pattern matches wins. */
export class TableSpiceFileValidator implements SpiceFileValidator {
  private readonly byType: ReadonlyMap<string, SpiceKernelDefinition>;

  constructor(private readonly kernels: readonly SpiceKernelDefinition[]) {
    this.byType = new Map(kernels.map((k) => [k.type, k] as const));
  }

  kernelType(type: string): SpiceKernelType | undefined {
    return this.byType.get(type);
  }

  extractComponents(path: string): SpiceFileComponents | undefined {
    const name = baseName(path);
    const parent = parentSegment(path);

    const candidates = this.kernels.flatMap((kernel) => {
      const match = kernel.regex.exec(name);
      return match ? [{ kernel, match }] : [];
    });
    const chosen = candidates.find((c) => c.kernel.subfolder === parent) ?? candidates[0];
    if (!chosen) return undefined;

    const { kernel, match } = chosen;
    const groups: Groups = match.groups ?? {};
    const start = readDate(groups, 'start');
    const end = readDate(groups, 'end');
    if (!start.ok || !end.ok) return undefined;

    const common = {
      type: kernel.type,
      subfolder: kernel.subfolder,
      datePartitioned: kernel.datePartitioned,
      startDate: start.date,
      endDate: end.date,
      extension: extensionOf(name),
    };

    const span = match.indices?.groups?.['version'];
    const digits = groups['version'];
    if (!kernel.versioned) return { ...common, versioned: false, name };
    if (!span || digits === undefined) return undefined;

    return {
      ...common,
      versioned: true,
      version: Number.parseInt(digits, 10),
      versionWidth: digits.length,
      namePrefix: name.slice(0, span[0]),
      nameSuffix: name.slice(span[1]),
    };
  }
}

export function loadSpiceFileValidator(
  fs: FileReadPort,
  filePath: string
): ResultAsync<TableSpiceFileValidator, ReferenceTableError> {
  return readJsonTable(fs, filePath, KernelTableFileSchema).map((file) => new TableSpiceFileValidator(file.kernels));
}
