// Index 0 is the year 3 (mod 12 / mod 10) of the common era.
export const CHINESE_ZODIAC = [
  '猪',
  '鼠',
  '牛',
  '虎',
  '兔',
  '龙',
  '蛇',
  '马',
  '羊',
  '猴',
  '鸡',
  '狗',
];

export const CELESTIAL_STEMS = [
  '癸',
  '甲',
  '乙',
  '丙',
  '丁',
  '戊',
  '己',
  '庚',
  '辛',
  '壬',
];

export const TERRESTRIAL_BRANCHES = [
  '亥',
  '子',
  '丑',
  '寅',
  '卯',
  '辰',
  '巳',
  '午',
  '未',
  '申',
  '酉',
  '戌',
];

export interface ConstellationRange {
  name: string;
  /** First day as `[month, day]`. */
  from: [number, number];
}

// Sorted by start date; a birthday belongs to the last range starting on or
// before it, wrapping to Capricorn before January 20.
export const CONSTELLATIONS: readonly ConstellationRange[] = [
  { name: '水瓶座', from: [1, 20] },
  { name: '双鱼座', from: [2, 19] },
  { name: '白羊座', from: [3, 21] },
  { name: '金牛座', from: [4, 20] },
  { name: '双子座', from: [5, 21] },
  { name: '巨蟹座', from: [6, 22] },
  { name: '狮子座', from: [7, 23] },
  { name: '处女座', from: [8, 23] },
  { name: '天秤座', from: [9, 23] },
  { name: '天蝎座', from: [10, 24] },
  { name: '射手座', from: [11, 23] },
  { name: '摩羯座', from: [12, 22] },
];
