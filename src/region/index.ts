export { RegionModule } from './region.module';
export { RegionService } from './region.service';
export {
  REGION_MODULE_OPTIONS,
  RegionModuleOptions,
  RegionModuleAsyncOptions,
} from './interfaces/region-module-options.interface';
export {
  ProvinceLookup,
  RegionRegistry,
} from './interfaces/region-lookup.interface';
export { PROVINCE_NAMES } from './constants/provinces';
