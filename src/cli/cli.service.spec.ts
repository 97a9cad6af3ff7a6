import { Test, TestingModule } from '@nestjs/testing';
import { FakeService } from '../fake/fake.service';
import { Gender } from '../identity/enums/gender.enum';
import { Jurisdiction } from '../identity/enums/jurisdiction.enum';
import { IdentityService } from '../identity/identity.service';
import { CliService, USAGE } from './cli.service';
import { CliUsageError } from './parse-args';

describe('CliService', () => {
  let service: CliService;
  let identityService: jest.Mocked<
    Pick<IdentityService, 'inspect' | 'describe' | 'upgrade'>
  >;
  let fakeService: jest.Mocked<Pick<FakeService, 'generateMany'>>;

  beforeEach(async () => {
    identityService = {
      inspect: jest.fn(),
      describe: jest.fn(),
      upgrade: jest.fn(),
    };
    fakeService = {
      generateMany: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CliService,
        {
          provide: IdentityService,
          useValue: identityService,
        },
        {
          provide: FakeService,
          useValue: fakeService,
        },
      ],
    }).compile();

    service = module.get<CliService>(CliService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('validate', () => {
    it('should inspect every number', () => {
      identityService.inspect
        .mockReturnValueOnce({ valid: true, jurisdiction: Jurisdiction.TW })
        .mockReturnValueOnce({ valid: false, error: 'TOO_SHORT' });

      expect(service.execute(['validate', 'A123456789', '123'])).toEqual([
        { number: 'A123456789', valid: true, jurisdiction: Jurisdiction.TW },
        { number: '123', valid: false, error: 'TOO_SHORT' },
      ]);
    });

    it('should require at least one number', () => {
      expect(() => service.execute(['validate'])).toThrow(USAGE);
    });
  });

  describe('inspect', () => {
    it('should fall back to the validation result for non-mainland numbers', () => {
      identityService.describe.mockReturnValue(undefined);
      identityService.inspect.mockReturnValue({
        valid: true,
        jurisdiction: Jurisdiction.HK,
      });

      expect(service.execute(['inspect', 'G123456(A)'])).toEqual({
        valid: true,
        jurisdiction: Jurisdiction.HK,
      });
    });

    it('should accept exactly one number', () => {
      expect(() => service.execute(['inspect', 'a', 'b'])).toThrow(
        CliUsageError,
      );
    });
  });

  describe('upgrade', () => {
    it('should return the upgraded number', () => {
      identityService.upgrade.mockReturnValue('632123198209270518');

      expect(service.execute(['upgrade', '632123820927051'])).toEqual({
        number: '632123820927051',
        upgraded: '632123198209270518',
      });
    });
  });

  describe('fake', () => {
    it('should translate flags into fake options', () => {
      fakeService.generateMany.mockReturnValue(['330106199012319985']);

      service.execute([
        'fake',
        '--region',
        '3301',
        '--min-year=1990',
        '--max-year',
        '2000',
        '--gender',
        'female',
        '--count',
        '2',
      ]);

      expect(fakeService.generateMany).toHaveBeenCalledWith(2, {
        region: '3301',
        minYear: 1990,
        maxYear: 2000,
        gender: Gender.Female,
      });
    });

    it('should generate one number by default', () => {
      fakeService.generateMany.mockReturnValue([]);

      service.execute(['fake']);

      expect(fakeService.generateMany).toHaveBeenCalledWith(1, {
        region: undefined,
        minYear: undefined,
        maxYear: undefined,
        gender: undefined,
      });
    });

    it('should reject malformed flags', () => {
      expect(() => service.execute(['fake', '--count', 'two'])).toThrow(
        '--count must be an integer, got "two"',
      );
      expect(() => service.execute(['fake', '--gender', 'x'])).toThrow(
        '--gender must be male or female, got "x"',
      );
    });
  });

  it('should reject unknown commands', () => {
    expect(() => service.execute(['parse'])).toThrow('Unknown command "parse"');
    expect(() => service.execute([])).toThrow(USAGE);
  });
});
