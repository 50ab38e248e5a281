import type { z } from 'zod';
import type {
  AppDescriptorSchema,
  ScoopDescriptorSchema,
  WingetDescriptorSchema,
  DownloadDescriptorSchema,
  CustomDescriptorSchema,
  CatalogSchema,
  SettingsSchema,
} from '../config/schema.js';

export type AppDescriptor = Readonly<z.infer<typeof AppDescriptorSchema>>;
export type ScoopDescriptor = Readonly<z.infer<typeof ScoopDescriptorSchema>>;
export type WingetDescriptor = Readonly<z.infer<typeof WingetDescriptorSchema>>;
export type DownloadDescriptor = Readonly<z.infer<typeof DownloadDescriptorSchema>>;
export type CustomDescriptor = Readonly<z.infer<typeof CustomDescriptorSchema>>;
export type PackageDescriptor = ScoopDescriptor | WingetDescriptor;

/** Descriptor shape as written in a catalog file, before defaults are applied. */
export type AppDescriptorInput = z.input<typeof AppDescriptorSchema>;

export type Catalog = Readonly<z.infer<typeof CatalogSchema>>;
export type Settings = z.infer<typeof SettingsSchema>;
