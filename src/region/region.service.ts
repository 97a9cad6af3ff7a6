import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { readFileSync } from 'fs';
import {
  RANDOM_SOURCE,
  RandomSource,
  mathRandomSource,
} from '../common/providers/random.provider';
import { PROVINCE_NAMES } from './constants/provinces';
import bundledRegions from './data/regions.json';
import {
  ProvinceLookup,
  RegionRegistry,
} from './interfaces/region-lookup.interface';
import {
  REGION_MODULE_OPTIONS,
  RegionModuleOptions,
} from './interfaces/region-module-options.interface';

const REGION_CODE = /^\d{6}$/;

function isRegionTable(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.entries(value).every(
    ([code, name]) =>
      REGION_CODE.test(code) && typeof name === 'string' && name.length > 0,
  );
}

/**
 * Read-only administrative-division registry. The table is loaded once when
 * the provider is constructed and never changes afterwards.
 */
@Injectable()
export class RegionService implements RegionRegistry, ProvinceLookup {
  private readonly logger = new Logger(RegionService.name);
  private readonly regions: ReadonlyMap<string, string>;
  private readonly codes: readonly string[];

  constructor(
    @Optional()
    @Inject(REGION_MODULE_OPTIONS)
    private readonly options: RegionModuleOptions = {},
    @Optional()
    @Inject(RANDOM_SOURCE)
    private readonly random: RandomSource = mathRandomSource,
  ) {
    const table = this.loadTable();
    this.regions = new Map(Object.entries(table));
    this.codes = [...this.regions.keys()].sort();
    this.logger.log(`Loaded ${this.codes.length} region codes`);
  }

  private loadTable(): Record<string, string> {
    if (this.options.entries) {
      if (!isRegionTable(this.options.entries)) {
        throw new Error('Region entries must map six-digit codes to names');
      }
      return this.options.entries;
    }

    if (this.options.dataPath) {
      const raw: unknown = JSON.parse(
        readFileSync(this.options.dataPath, 'utf8'),
      );
      if (!isRegionTable(raw)) {
        throw new Error(
          `Region data at ${this.options.dataPath} must map six-digit codes to names`,
        );
      }
      return raw;
    }

    return bundledRegions;
  }

  lookup(code: string): string | undefined {
    return this.regions.get(code);
  }

  contains(code: string): boolean {
    return this.regions.has(code);
  }

  size(): number {
    return this.codes.length;
  }

  randomCode(): string {
    if (this.codes.length === 0) {
      throw new Error('Region registry is empty');
    }
    return this.codes[this.random.nextInt(0, this.codes.length - 1)];
  }

  randomCodeWithPrefix(prefix: string): string | undefined {
    if (!prefix) {
      return undefined;
    }
    const candidates = this.codes.filter((code) => code.startsWith(prefix));
    if (candidates.length === 0) {
      return undefined;
    }
    return candidates[this.random.nextInt(0, candidates.length - 1)];
  }

  province(code: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(PROVINCE_NAMES, code)
      ? PROVINCE_NAMES[code]
      : undefined;
  }
}
