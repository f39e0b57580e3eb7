import { z } from 'zod';
import { ContractViolationError } from './errors';

// --- Settings ---

const WriterSettingsSchema = z.object({
  /** One indentation unit; tabs or spaces only */
  indent: z.string().regex(/^[\t ]*$/, 'indent may only contain tabs and spaces').default('\t'),
  newline: z.enum(['lf', 'crlf']).default('lf'),
  /** Reproduce the line structure recorded while parsing */
  preserveLayout: z.boolean().default(true),
});

const LoggingSettingsSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
});

const SettingsSchema = z.object({
  writer: WriterSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});

export type WriterSettings = z.infer<typeof WriterSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Merge partial writer settings over the defaults and validate the result */
export function resolveWriterSettings(partial: Partial<WriterSettings> = {}): WriterSettings {
  const result = WriterSettingsSchema.safeParse({ ...DEFAULT_SETTINGS.writer, ...partial });
  if (!result.success) {
    throw new ContractViolationError(`Invalid writer settings: ${describeIssues(result.error)}`, {
      operation: 'resolveWriterSettings',
    });
  }
  return result.data;
}

export function resolveSettings(partial: unknown = {}): Settings {
  const result = SettingsSchema.safeParse(partial);
  if (!result.success) {
    throw new ContractViolationError(`Invalid settings: ${describeIssues(result.error)}`, {
      operation: 'resolveSettings',
    });
  }
  return result.data;
}

export function newlineText(newline: WriterSettings['newline']): '\n' | '\r\n' {
  return newline === 'crlf' ? '\r\n' : '\n';
}

// --- Format eras ---

export type FormatEra = 'kicad6' | 'kicad7' | 'kicad8' | 'kicad9';

export interface FormatEraProfile {
  era: FormatEra;
  /** First file `version` stamp written by this release family */
  firstVersion: number;
  /** Indentation unit the release writes */
  indent: string;
}

/** Ordered oldest first */
export const FORMAT_ERAS: readonly FormatEraProfile[] = [
  { era: 'kicad6', firstVersion: 20211014, indent: '  ' },
  { era: 'kicad7', firstVersion: 20221018, indent: '  ' },
  { era: 'kicad8', firstVersion: 20231120, indent: '\t' },
  { era: 'kicad9', firstVersion: 20241229, indent: '\t' },
];

/** Release family of a file version stamp; stamps older than KiCad 6 map to kicad6 */
export function formatEraOf(version: number | undefined): FormatEraProfile {
  const newest = FORMAT_ERAS[FORMAT_ERAS.length - 1];
  if (version === undefined) return newest;
  let match = FORMAT_ERAS[0];
  for (const profile of FORMAT_ERAS) {
    if (version >= profile.firstVersion) match = profile;
  }
  return match;
}
