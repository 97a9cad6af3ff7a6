import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CliModule } from './cli/cli.module';
import { CommonModule } from './common/common.module';
import { envValidationSchema } from './config/env.validation';
import { FakeModule } from './fake/fake.module';
import { IdentityModule } from './identity/identity.module';
import { RegionModule } from './region/region.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: envValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
    }),
    CommonModule,
    RegionModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        dataPath: configService.get<string>('REGION_DATA_PATH'),
      }),
      inject: [ConfigService],
    }),
    IdentityModule,
    FakeModule,
    CliModule,
  ],
})
export class AppModule {}
