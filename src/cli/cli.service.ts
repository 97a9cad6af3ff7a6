import { Injectable, Logger } from '@nestjs/common';
import { FakeOptions } from '../fake/dto/fake-options.dto';
import { FakeService } from '../fake/fake.service';
import { Gender } from '../identity/enums/gender.enum';
import { IdentityDetails } from '../identity/interfaces/identity-summary.interface';
import { ValidationResult } from '../identity/interfaces/validation-result.interface';
import { IdentityService } from '../identity/identity.service';
import { CliUsageError, parseArgs } from './parse-args';

export const USAGE = `Usage:
  idcard validate <number...>
  idcard inspect <number>
  idcard upgrade <number>
  idcard fake [--region <prefix>] [--min-year <year>] [--max-year <year>] [--gender male|female] [--count <n>]`;

export type CliResult =
  | Array<ValidationResult & { number: string }>
  | IdentityDetails
  | ValidationResult
  | { number: string; upgraded: string }
  | string[];

function intFlag(
  flags: Record<string, string>,
  name: string,
): number | undefined {
  const raw = flags[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new CliUsageError(`--${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function genderFlag(flags: Record<string, string>): Gender | undefined {
  const raw = flags.gender;
  if (raw === undefined) {
    return undefined;
  }
  const gender = Object.values(Gender).find((value) => value === raw);
  if (!gender) {
    throw new CliUsageError(`--gender must be male or female, got "${raw}"`);
  }
  return gender;
}

@Injectable()
export class CliService {
  private readonly logger = new Logger(CliService.name);

  constructor(
    private readonly identityService: IdentityService,
    private readonly fakeService: FakeService,
  ) {}

  execute(argv: string[]): CliResult {
    const { command, positionals, flags } = parseArgs(argv);
    this.logger.debug(`Running ${command ?? '(none)'}`);

    switch (command) {
      case 'validate':
        this.requireNumbers(positionals, 1);
        return positionals.map((number) => ({
          number,
          ...this.identityService.inspect(number),
        }));

      case 'inspect': {
        this.requireNumbers(positionals, 1, 1);
        const [number] = positionals;
        return (
          this.identityService.describe(number) ??
          this.identityService.inspect(number)
        );
      }

      case 'upgrade': {
        this.requireNumbers(positionals, 1, 1);
        const [number] = positionals;
        return { number, upgraded: this.identityService.upgrade(number) };
      }

      case 'fake': {
        const options: FakeOptions = {
          region: flags.region,
          minYear: intFlag(flags, 'min-year'),
          maxYear: intFlag(flags, 'max-year'),
          gender: genderFlag(flags),
        };
        return this.fakeService.generateMany(
          intFlag(flags, 'count') ?? 1,
          options,
        );
      }

      default:
        throw new CliUsageError(
          command ? `Unknown command "${command}"\n${USAGE}` : USAGE,
        );
    }
  }

  private requireNumbers(positionals: string[], min: number, max = Infinity) {
    if (positionals.length < min || positionals.length > max) {
      throw new CliUsageError(USAGE);
    }
  }
}
