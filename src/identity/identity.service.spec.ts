import { Test, TestingModule } from '@nestjs/testing';
import { UpgradeError } from '../common/errors';
import { CLOCK } from '../common/providers/clock.provider';
import { RegionService } from '../region/region.service';
import { Gender } from './enums/gender.enum';
import { Jurisdiction } from './enums/jurisdiction.enum';
import { IdentityService } from './identity.service';

describe('IdentityService', () => {
  let service: IdentityService;
  let clock: jest.Mock<Date, []>;

  beforeEach(async () => {
    clock = jest.fn(() => new Date(2024, 5, 15));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IdentityService,
        {
          provide: RegionService,
          useValue: new RegionService({
            entries: {
              '511702': '四川省达州市通川区',
              '632123': '青海省海东地区乐都县',
            },
          }),
        },
        {
          provide: CLOCK,
          useValue: clock,
        },
      ],
    }).compile();

    service = module.get<IdentityService>(IdentityService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('validate', () => {
    it('should validate every supported jurisdiction', () => {
      expect(service.validate('511702800222130')).toBe(true);
      expect(service.validate('230127197908177456')).toBe(true);
      expect(service.validate('A123456789')).toBe(true);
      expect(service.validate('G123456(A)')).toBe(true);
      expect(service.validate('7431243(3)')).toBe(true);
    });

    it('should reject invalid numbers', () => {
      expect(service.validate('Q155304680')).toBe(false);
      expect(service.validate('G123456(a)')).toBe(false);
      expect(service.validate('hello')).toBe(false);
    });
  });

  describe('inspect', () => {
    it('should expose the error code', () => {
      expect(service.inspect('230127197908177457')).toEqual({
        valid: false,
        jurisdiction: Jurisdiction.CN18,
        error: 'CHECKSUM_MISMATCH',
      });
    });
  });

  describe('upgrade', () => {
    it('should upgrade a legacy number', () => {
      expect(service.upgrade('632123820927051')).toBe('632123198209270518');
    });

    it('should rethrow upgrade failures', () => {
      expect(() => service.upgrade('6321238209270')).toThrow(UpgradeError);
    });
  });

  describe('describe', () => {
    it('should resolve names and age with the injected clock', () => {
      expect(service.describe('511702800222130')).toEqual({
        number: '511702198002221308',
        valid: true,
        birthDate: '1980-02-22',
        year: 1980,
        month: 2,
        day: 22,
        gender: Gender.Female,
        regionCode: '511702',
        constellation: '双鱼座',
        chineseEra: '庚申',
        chineseZodiac: '猴',
        age: 44,
        province: '四川',
        region: '四川省达州市通川区',
      });
      expect(clock).toHaveBeenCalled();
    });

    it('should leave the region absent when the code is not registered', () => {
      const details = service.describe('230127197908177456');

      expect(details?.valid).toBe(true);
      expect(details?.province).toBe('黑龙江');
      expect(details?.region).toBeUndefined();
    });

    it('should return undefined for invalid numbers', () => {
      expect(service.describe('230127197908177457')).toBeUndefined();
      expect(service.describe('A123456789')).toBeUndefined();
    });
  });

  describe('province and region', () => {
    it('should report nothing for an invalid identity', () => {
      const identity = service.parse('000000');

      expect(service.province(identity)).toBeUndefined();
      expect(service.region(identity)).toBeUndefined();
      expect(service.age(identity)).toBeUndefined();
    });
  });

  describe('Taiwan accessors', () => {
    it('should expose gender and place of registration', () => {
      expect(service.taiwanGender('A225376624')).toBe(Gender.Female);
      expect(service.taiwanRegion('A123456789')).toBe('台北市');
      expect(service.taiwanRegion('Q155304680')).toBeUndefined();
    });
  });
});
