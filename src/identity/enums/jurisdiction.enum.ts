export enum Jurisdiction {
  /** Mainland China, legacy 15-digit form without century or check digit */
  CN15 = 'CN15',
  /** Mainland China, 18-digit form */
  CN18 = 'CN18',
  HK = 'HK',
  MO = 'MO',
  TW = 'TW',
}
