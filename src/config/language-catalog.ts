import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { env } from './env';
import { logger } from '../observability/logger';
import { isLanguageCode, normalizeLanguage } from '../desk/invariants';

export interface LanguageOption {
  code: string;
  label: string;
}

const DEFAULT_FILE = path.resolve(env.projectRoot, 'config', 'languages.yaml');

/** Languages a customer can pick at session start. */
export class LanguageCatalog {
  private options: LanguageOption[] = [];

  constructor(private readonly filepath: string = DEFAULT_FILE) {
    this.loadAll();
  }

  loadAll(): void {
    const loaded = this.loadYAML();
    this.options = loaded.length > 0 ? loaded : LanguageCatalog.builtInDefault();
    logger.info({ languageCount: this.options.length }, 'Language catalog loaded');
  }

  list(): LanguageOption[] {
    return this.options.map((o) => ({ ...o }));
  }

  has(code: string): boolean {
    const normalized = normalizeLanguage(code);
    return this.options.some((o) => o.code === normalized);
  }

  label(code: string): string {
    const normalized = normalizeLanguage(code);
    return this.options.find((o) => o.code === normalized)?.label ?? normalized.toUpperCase();
  }

  private loadYAML(): LanguageOption[] {
    if (!fs.existsSync(this.filepath)) {
      logger.warn({ filepath: this.filepath }, 'Language catalog not found; using built-in default');
      return [];
    }
    try {
      const parsed: unknown = yaml.load(fs.readFileSync(this.filepath, 'utf-8'));
      if (!Array.isArray(parsed)) {
        logger.error({ filepath: this.filepath }, 'Language catalog must be a list');
        return [];
      }
      const options: LanguageOption[] = [];
      for (const entry of parsed) {
        const option = LanguageCatalog.toOption(entry);
        if (option) options.push(option);
        else logger.warn({ entry }, 'Skipping malformed language entry');
      }
      return options;
    } catch (err) {
      logger.error({ err, filepath: this.filepath }, 'Failed to load language catalog');
      return [];
    }
  }

  private static toOption(entry: unknown): LanguageOption | null {
    if (typeof entry !== 'object' || entry === null) return null;
    if (!('code' in entry) || typeof entry.code !== 'string') return null;
    const code = normalizeLanguage(entry.code);
    if (!isLanguageCode(code)) return null;
    const label = 'label' in entry && typeof entry.label === 'string' ? entry.label : code.toUpperCase();
    return { code, label };
  }

  static builtInDefault(): LanguageOption[] {
    return [
      { code: 'en', label: 'English' },
      { code: 'es', label: 'Español' },
      { code: 'fr', label: 'Français' },
      { code: 'de', label: 'Deutsch' },
    ];
  }
}
