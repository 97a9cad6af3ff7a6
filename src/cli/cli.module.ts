import { Module } from '@nestjs/common';
import { FakeModule } from '../fake/fake.module';
import { IdentityModule } from '../identity/identity.module';
import { CliService } from './cli.service';

@Module({
  imports: [IdentityModule, FakeModule],
  providers: [CliService],
  exports: [CliService],
})
export class CliModule {}
