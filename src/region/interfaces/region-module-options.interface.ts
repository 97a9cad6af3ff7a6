import { FactoryProvider } from '@nestjs/common';

export const REGION_MODULE_OPTIONS = 'REGION_MODULE_OPTIONS';

export interface RegionModuleOptions {
  /** Path to a JSON object mapping six-digit codes to names. */
  dataPath?: string;
  /** In-memory table; takes precedence over `dataPath`. */
  entries?: Record<string, string>;
}

export interface RegionModuleAsyncOptions {
  useFactory: FactoryProvider<RegionModuleOptions>['useFactory'];
  inject?: FactoryProvider<RegionModuleOptions>['inject'];
}
