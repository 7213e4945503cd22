import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { TemplateNotFoundError, formatValidationErrors, toError } from '../errors';
import { Logger, createLogger } from '../utils/logger';

export const PromptTemplateSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    version: z.string().default('1.0'),
    description: z.string().optional(),
    author: z.string().optional(),
    lastModified: z.string().optional(),
  }),
  template: z.object({
    role: z.string().default(''),
    task: z.string().default(''),
    instructions: z.array(z.string()).default([]),
  }),
  examples: z
    .array(
      z.object({
        input: z.string(),
        output: z.unknown(),
      })
    )
    .default([]),
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;

export type DuplicatePolicy = 'first-wins' | 'last-wins';

export interface TemplateStoreOptions {
  rootDir: string;
  duplicatePolicy?: DuplicatePolicy;
  logger?: Logger;
}

export interface LoadSummary {
  loaded: string[];
  skipped: Array<{ file: string; reason: string }>;
  duplicates: Array<{ name: string; file: string }>;
}

async function findJsonFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findJsonFiles(full)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.json')) {
      files.push(full);
    }
  }
  return files;
}

function isMissingDirectory(error: unknown): boolean {
  // fs errors from another realm (e.g. a test VM) fail `instanceof Error`.
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class PromptTemplateStore {
  private templates = new Map<string, PromptTemplate>();
  private readonly duplicatePolicy: DuplicatePolicy;
  private readonly logger: Logger;

  constructor(private readonly options: TemplateStoreOptions) {
    this.duplicatePolicy = options.duplicatePolicy ?? 'first-wins';
    this.logger = options.logger ?? createLogger('prompt-templates');
  }

  get size(): number {
    return this.templates.size;
  }

  names(): string[] {
    return [...this.templates.keys()].sort();
  }

  get(name: string): PromptTemplate | undefined {
    return this.templates.get(name);
  }

  require(name: string): PromptTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new TemplateNotFoundError(name);
    }
    return template;
  }

  async load(): Promise<LoadSummary> {
    const summary: LoadSummary = { loaded: [], skipped: [], duplicates: [] };
    const loaded = new Map<string, PromptTemplate>();
    const { rootDir } = this.options;

    let files: string[];
    try {
      files = await findJsonFiles(rootDir);
    } catch (error) {
      if (isMissingDirectory(error)) {
        this.logger.warn(`Prompt directory not found: ${rootDir}`);
        this.templates = loaded;
        return summary;
      }
      throw error;
    }

    // Sorted so "first" means the same thing on every filesystem.
    files.sort((a, b) => path.relative(rootDir, a).localeCompare(path.relative(rootDir, b)));

    for (const file of files) {
      const relative = path.relative(rootDir, file);
      let template: PromptTemplate;
      try {
        const parsed = PromptTemplateSchema.safeParse(JSON.parse(await readFile(file, 'utf-8')));
        if (!parsed.success) {
          throw new Error(`invalid template:\n${formatValidationErrors(parsed.error)}`);
        }
        template = parsed.data;
      } catch (error) {
        const reason = toError(error).message;
        this.logger.error(`Error loading prompt template ${relative}`, { reason });
        summary.skipped.push({ file: relative, reason });
        continue;
      }

      const name = template.metadata.name;
      if (loaded.has(name)) {
        summary.duplicates.push({ name, file: relative });
        if (this.duplicatePolicy === 'first-wins') {
          this.logger.warn(`Duplicate prompt template ${name} in ${relative} ignored`);
          continue;
        }
        this.logger.warn(`Duplicate prompt template ${name} in ${relative} replaces earlier definition`);
      }
      loaded.set(name, template);
    }

    this.templates = loaded;
    summary.loaded = [...loaded.keys()].sort();
    this.logger.info(`Loaded ${loaded.size} prompt templates`, { rootDir });
    return summary;
  }

  async reload(): Promise<LoadSummary> {
    this.templates = new Map();
    return this.load();
  }
}
