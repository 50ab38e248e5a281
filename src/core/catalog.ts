import { readFileSync } from 'node:fs';
import Handlebars from 'handlebars';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { CatalogSchema } from '../config/schema.js';
import type { AppDescriptor, Catalog } from '../types/descriptor.js';
import { CatalogError, errorMessage } from './errors.js';

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function checkTemplates(catalog: Catalog, source: string): void {
  const steps: [string, string][] = [
    ...catalog.nextSteps.map((step, i): [string, string] => [`nextSteps.${i}`, step]),
    ...catalog.apps.flatMap((app, a) =>
      (app.nextSteps ?? []).map((step, i): [string, string] => [`apps.${a}.nextSteps.${i}`, step]),
    ),
  ];
  for (const [path, step] of steps) {
    try {
      Handlebars.parse(step);
    } catch (err) {
      throw new CatalogError(`${source}: ${path}: invalid template: ${errorMessage(err)}`);
    }
  }
}

export function parseCatalog(raw: string, source = 'catalog'): Catalog {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new CatalogError(`${source}: invalid YAML: ${errorMessage(err)}`);
  }

  const parsed = CatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new CatalogError(`${source}: ${formatIssues(parsed.error)}`);
  }
  checkTemplates(parsed.data, source);
  return deepFreeze(parsed.data);
}

export function loadCatalog(path: string): Catalog {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new CatalogError(`Cannot read catalog ${path}: ${errorMessage(err)}`);
  }
  return parseCatalog(raw, path);
}

/**
 * Keeps catalog order. Names match case-insensitively; an unknown name is an
 * error rather than a silent no-op.
 */
export function selectApps(catalog: Catalog, names: readonly string[]): AppDescriptor[] {
  if (names.length === 0) return [...catalog.apps];

  const wanted = new Set(names.map((n) => n.toLowerCase()));
  const known = new Set(catalog.apps.map((app) => app.name.toLowerCase()));
  const unknown = names.filter((n) => !known.has(n.toLowerCase()));
  if (unknown.length > 0) {
    throw new CatalogError(`Unknown app(s): ${unknown.join(', ')}`);
  }
  return catalog.apps.filter((app) => wanted.has(app.name.toLowerCase()));
}

/** Catalog-wide steps followed by each selected app's own steps. */
export function collectNextSteps(catalog: Catalog, apps: readonly AppDescriptor[]): string[] {
  return [...catalog.nextSteps, ...apps.flatMap((app) => app.nextSteps ?? [])];
}
