import { DynamicModule, Module } from '@nestjs/common';
import {
  REGION_MODULE_OPTIONS,
  RegionModuleAsyncOptions,
  RegionModuleOptions,
} from './interfaces/region-module-options.interface';
import { RegionService } from './region.service';

@Module({})
export class RegionModule {
  static forRoot(options: RegionModuleOptions = {}): DynamicModule {
    return {
      module: RegionModule,
      providers: [
        {
          provide: REGION_MODULE_OPTIONS,
          useValue: options,
        },
        RegionService,
      ],
      exports: [RegionService],
      global: true,
    };
  }

  static forRootAsync(options: RegionModuleAsyncOptions): DynamicModule {
    return {
      module: RegionModule,
      providers: [
        {
          provide: REGION_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
        RegionService,
      ],
      exports: [RegionService],
      global: true,
    };
  }
}
