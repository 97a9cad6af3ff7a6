import { Global, Module } from '@nestjs/common';
import { CLOCK, systemClock } from './providers/clock.provider';
import { RANDOM_SOURCE, mathRandomSource } from './providers/random.provider';

@Global()
@Module({
  providers: [
    {
      provide: CLOCK,
      useValue: systemClock,
    },
    {
      provide: RANDOM_SOURCE,
      useValue: mathRandomSource,
    },
  ],
  exports: [CLOCK, RANDOM_SOURCE],
})
export class CommonModule {}
