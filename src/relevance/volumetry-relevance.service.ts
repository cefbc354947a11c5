import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import searchConfig, { SearchConfig } from '../config/search.config';
import { errorMessage } from '../common/errors/search.errors';
import { normalizeTitle } from '../common/utils/normalize';
import { RelevanceItem, RelevanceSource, VolumetryEntry } from './interfaces/relevance.interface';

type VolumetryRow = Omit<VolumetryEntry, 'source'> & { source?: string };

const isVolumetryRow = (value: unknown): value is VolumetryRow =>
  typeof value === 'object' &&
  value !== null &&
  'title' in value &&
  typeof value.title === 'string' &&
  value.title.trim().length > 0 &&
  'accesses' in value &&
  typeof value.accesses === 'number' &&
  Number.isInteger(value.accesses) &&
  value.accesses >= 0 &&
  (!('source' in value) || typeof value.source === 'string');

/**
 * Scores titles by how often the service was accessed, as a percentile of
 * every known title (0-100). Entries sharing a normalized title are merged
 * and their accesses summed.
 */
@Injectable()
export class VolumetryRelevanceService implements RelevanceSource, OnModuleInit {
  private readonly logger = new Logger(VolumetryRelevanceService.name);
  private items = new Map<string, RelevanceItem>();
  private loadedAt?: Date;

  constructor(@Inject(searchConfig.KEY) private readonly config: SearchConfig) {}

  async onModuleInit(): Promise<void> {
    const path = this.config.relevanceDataPath;
    if (!path) {
      this.logger.warn('No relevance data configured; every title scores 0');
      return;
    }
    try {
      await this.loadFromFile(path);
    } catch (error) {
      this.logger.error(`Could not load relevance data from ${path}: ${errorMessage(error)}`);
    }
  }

  async loadFromFile(path: string): Promise<number> {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
    if (!Array.isArray(parsed)) {
      throw new Error('Relevance data must be a JSON array');
    }

    const entries: VolumetryEntry[] = [];
    parsed.forEach((row: unknown, i) => {
      if (isVolumetryRow(row)) {
        entries.push({ title: row.title, accesses: row.accesses, source: row.source ?? 'unknown' });
      } else {
        this.logger.warn(`Skipping malformed relevance entry at index ${i}`);
      }
    });

    const count = this.loadEntries(entries);
    this.logger.log(`Loaded relevance for ${count} titles from ${path}`);
    return count;
  }

  /**
   * Replaces the loaded data. Returns the number of distinct titles.
   */
  loadEntries(entries: VolumetryEntry[]): number {
    const items = new Map<string, RelevanceItem>();
    for (const entry of entries) {
      const key = normalizeTitle(entry.title);
      const existing = items.get(key);
      if (existing) {
        existing.accesses += entry.accesses;
        if (existing.source !== entry.source) {
          existing.source = 'multiple';
        }
      } else {
        items.set(key, { ...entry, title: entry.title.trim(), relevance: 0 });
      }
    }

    const sorted = [...items.values()].map(item => item.accesses).sort((a, b) => a - b);
    for (const item of items.values()) {
      item.relevance = percentile(item.accesses, sorted);
    }

    this.items = items;
    this.loadedAt = new Date();
    return items.size;
  }

  scoreByTitle(title: string): number {
    return this.items.get(normalizeTitle(title))?.relevance ?? 0;
  }

  get lastLoaded(): Date | undefined {
    return this.loadedAt;
  }
}

/**
 * Position of the last sorted value not above `accesses`, scaled to 0-100.
 */
export function percentile(accesses: number, sorted: number[]): number {
  if (sorted.length === 0) {
    return 0;
  }
  let position = 0;
  sorted.forEach((value, i) => {
    if (value <= accesses) {
      position = i;
    }
  });
  return Math.floor((position * 100) / sorted.length);
}
