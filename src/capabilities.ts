import { describeError } from './errors.js';

export type Engines = {
  pdf: typeof import('./engines/pdf.js');
  fonts: typeof import('./engines/fonts.js');
  security: typeof import('./engines/security.js');
  imaging: typeof import('./engines/imaging.js');
  raster: typeof import('./engines/raster.js');
  archive: typeof import('./engines/archive.js');
};

export type EngineName = keyof Engines;

export const ENGINE_NAMES: readonly EngineName[] = ['pdf', 'fonts', 'security', 'imaging', 'raster', 'archive'];

export type EngineLoaders = { [K in EngineName]: () => Promise<Engines[K]> };

/** The npm package behind each engine, as reported by /api/status. */
export const ENGINE_PACKAGES: Record<EngineName, string> = {
  pdf: 'pdf-lib',
  fonts: '@pdf-lib/standard-fonts',
  security: '@cantoo/pdf-lib',
  imaging: 'sharp',
  raster: 'pdf-to-img',
  archive: 'jszip',
};

export const TOOL_NAMES = [
  'merge',
  'split',
  'compress',
  'rotate',
  'extract',
  'remove_pages',
  'page_numbers',
  'watermark',
  'protect',
  'unlock',
  'images_to_pdf',
  'jpg_to_pdf',
  'pdf_to_jpg',
  'info',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const TOOL_REQUIREMENTS: Record<ToolName, readonly EngineName[]> = {
  merge: ['pdf'],
  split: ['pdf', 'archive'],
  compress: ['pdf'],
  rotate: ['pdf'],
  extract: ['pdf'],
  remove_pages: ['pdf'],
  page_numbers: ['pdf', 'fonts'],
  watermark: ['pdf', 'fonts'],
  protect: ['security'],
  unlock: ['security'],
  images_to_pdf: ['imaging', 'pdf'],
  jpg_to_pdf: ['imaging', 'pdf'],
  pdf_to_jpg: ['raster', 'imaging', 'archive'],
  info: ['pdf'],
};

export const DEFAULT_LOADERS: EngineLoaders = {
  pdf: () => import('./engines/pdf.js'),
  fonts: () => import('./engines/fonts.js'),
  security: () => import('./engines/security.js'),
  imaging: () => import('./engines/imaging.js'),
  raster: () => import('./engines/raster.js'),
  archive: () => import('./engines/archive.js'),
};

async function attempt<T>(name: EngineName, loader: () => Promise<T>): Promise<T | undefined> {
  try {
    return await loader();
  } catch (error) {
    console.warn(`[capabilities] ${ENGINE_PACKAGES[name]} unavailable: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Which operations this process can serve, decided once at startup from
 * which engine modules (and so which libraries) imported successfully.
 */
export class CapabilityRegistry {
  private readonly engines: Partial<Engines>;

  constructor(engines: Partial<Engines>) {
    this.engines = Object.freeze({ ...engines });
  }

  static async load(overrides: Partial<EngineLoaders> = {}): Promise<CapabilityRegistry> {
    const loaders: EngineLoaders = { ...DEFAULT_LOADERS, ...overrides };

    return new CapabilityRegistry({
      pdf: await attempt('pdf', loaders.pdf),
      fonts: await attempt('fonts', loaders.fonts),
      security: await attempt('security', loaders.security),
      imaging: await attempt('imaging', loaders.imaging),
      raster: await attempt('raster', loaders.raster),
      archive: await attempt('archive', loaders.archive),
    });
  }

  hasEngine(name: EngineName): boolean {
    return this.engines[name] !== undefined;
  }

  /** Package name → whether it loaded. */
  libraries(): Record<string, boolean> {
    const report: Record<string, boolean> = {};
    for (const name of ENGINE_NAMES) {
      report[ENGINE_PACKAGES[name]] = this.hasEngine(name);
    }
    return report;
  }

  missingEngine(tool: ToolName): EngineName | undefined {
    return TOOL_REQUIREMENTS[tool].find((name) => !this.hasEngine(name));
  }

  available(tool: ToolName): boolean {
    return this.missingEngine(tool) === undefined;
  }

  listAvailable(): ToolName[] {
    return TOOL_NAMES.filter((tool) => this.available(tool));
  }

  unavailableMessage(tool: ToolName): string | undefined {
    const missing = this.missingEngine(tool);
    if (!missing) return undefined;
    const pkg = ENGINE_PACKAGES[missing];
    return `${pkg} is not installed. Run: npm install ${pkg}`;
  }

  engine<K extends EngineName>(name: K): Engines[K] {
    const engine = this.engines[name];
    if (engine === undefined) {
      throw new Error(`${ENGINE_PACKAGES[name]} is not installed`);
    }
    return engine;
  }
}
