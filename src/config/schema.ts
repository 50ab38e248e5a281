import { z } from 'zod';

// ── Shared sub-schemas ──────────────────────────────────────────────

export const LOG_LEVELS = ['Debug', 'Info', 'Warning', 'Error'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

const InstallerArgsSchema = z.union([z.string(), z.array(z.string())]);

// ── Descriptor base fields (shared by all install methods) ──────────

const BaseFields = {
  name: z.string().min(1),
  detectionPaths: z.array(z.string().min(1)).default([]),
  detectionCommand: z.string().min(1).optional(),
  timeoutSeconds: z.number().int().positive().optional(),
  nextSteps: z.array(z.string()).optional(),
};

// ── Install method schemas ──────────────────────────────────────────

export const INSTALL_METHODS = ['scoop', 'winget', 'download', 'custom'] as const;

export const PACKAGE_MANAGERS = ['scoop', 'winget'] as const;

export type PackageManagerId = (typeof PACKAGE_MANAGERS)[number];

export const ScoopDescriptorSchema = z.object({
  ...BaseFields,
  installMethod: z.literal('scoop'),
  packageRef: z.string().min(1),
  detectViaListing: z.boolean().optional(),
});

export const WingetDescriptorSchema = z.object({
  ...BaseFields,
  installMethod: z.literal('winget'),
  packageRef: z.string().min(1),
  detectViaListing: z.boolean().optional(),
});

export const DownloadDescriptorSchema = z.object({
  ...BaseFields,
  installMethod: z.literal('download'),
  downloadUrl: z.string().url(),
  installerArgs: InstallerArgsSchema.default([]),
});

export const CustomDescriptorSchema = z.object({
  ...BaseFields,
  installMethod: z.literal('custom'),
  command: z.string().min(1),
});

// ── Discriminated union ─────────────────────────────────────────────

export const AppDescriptorSchema = z.discriminatedUnion('installMethod', [
  ScoopDescriptorSchema,
  WingetDescriptorSchema,
  DownloadDescriptorSchema,
  CustomDescriptorSchema,
]);

// ── Catalog ─────────────────────────────────────────────────────────

export const CleanupSchema = z.object({
  paths: z.array(z.string().min(1)).default([]),
  olderThanDays: z.number().nonnegative().default(7),
  commands: z.array(z.string().min(1)).default([]),
});

export const CatalogSchema = z
  .object({
    version: z.literal(1),
    apps: z.array(AppDescriptorSchema),
    cleanup: CleanupSchema.optional(),
    nextSteps: z.array(z.string()).default([]),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.apps.forEach((app, index) => {
      const key = app.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['apps', index, 'name'],
          message: `Duplicate app name "${app.name}"`,
        });
      }
      seen.add(key);
    });
  });

// ── User settings ───────────────────────────────────────────────────

export const SettingsSchema = z.object({
  log_level: LogLevelSchema.optional(),
  log_file: z.string().optional(),
  catalog: z.string().optional(),
  scratch_dir: z.string().optional(),
  timeout_seconds: z.coerce.number().int().positive().optional(),
  extra_paths: z.array(z.string()).optional(),
});

export const SETTING_KEYS = SettingsSchema.keyof().options;
