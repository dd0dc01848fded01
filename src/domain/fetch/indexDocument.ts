import { z } from 'zod';

import type {
  ExtendedPackage,
  Homepage,
  IndexDocument,
  IndexVariant,
  PlainPackage,
} from '../types/packageIndex.js';
import { DecodeError } from './errors.js';

const flag = z.boolean().optional().default(false);

const HomepageSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(
    (value): Homepage =>
      typeof value === 'string' ? { kind: 'single', value } : { kind: 'list', values: value },
  );

export const PackageMetaSchema = z.object({
  broken: flag,
  insecure: flag,
  unsupported: flag,
  unfree: flag,
  description: z.string().optional(),
  longdescription: z.string().optional(),
  homepage: HomepageSchema.optional(),
  maintainers: z.unknown().optional(),
  license: z.unknown().optional(),
  platforms: z.unknown().optional(),
  position: z.string().optional(),
});

export const PlainPackageSchema = z.object({
  pname: z.string(),
  version: z.string(),
});

export const ExtendedPackageSchema = PlainPackageSchema.extend({
  system: z.string(),
  meta: PackageMetaSchema.optional().transform((meta) => meta ?? PackageMetaSchema.parse({})),
});

const PlainMappingSchema = z.record(PlainPackageSchema);
const ExtendedMappingSchema = z.record(ExtendedPackageSchema);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The published index wraps the attribute mapping in `{ version, packages }`;
 * a bare mapping is accepted too. A top-level `packages` entry that is itself
 * a package record is treated as an attribute, not as the envelope.
 */
export function unwrapEnvelope(document: unknown): unknown {
  if (!isRecord(document)) {
    return document;
  }
  const inner = document.packages;
  if (isRecord(inner) && typeof inner.pname !== 'string') {
    return inner;
  }
  return document;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

export function decodeIndexDocument(raw: unknown, variant: IndexVariant): IndexDocument {
  const mapping = unwrapEnvelope(raw);

  if (variant === 'plain') {
    const parsed = PlainMappingSchema.safeParse(mapping);
    if (!parsed.success) {
      throw new DecodeError('Malformed plain index document', formatIssues(parsed.error));
    }
    return {
      variant,
      packages: new Map<string, PlainPackage>(Object.entries(parsed.data)),
    };
  }

  const parsed = ExtendedMappingSchema.safeParse(mapping);
  if (!parsed.success) {
    throw new DecodeError('Malformed extended index document', formatIssues(parsed.error));
  }
  return {
    variant,
    packages: new Map<string, ExtendedPackage>(Object.entries(parsed.data)),
  };
}

export function parseIndexText(text: string, variant: IndexVariant): IndexDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DecodeError('Index document is not valid JSON', String(error));
  }
  return decodeIndexDocument(raw, variant);
}
