export interface TaiwanPrefix {
  code: number;
  place: string;
}

// I and O were issued last, which is why they sort after Z.
export const TAIWAN_PREFIXES: Readonly<Record<string, TaiwanPrefix>> = {
  A: { code: 10, place: '台北市' },
  B: { code: 11, place: '台中市' },
  C: { code: 12, place: '基隆市' },
  D: { code: 13, place: '台南市' },
  E: { code: 14, place: '高雄市' },
  F: { code: 15, place: '新北市' },
  G: { code: 16, place: '宜兰县' },
  H: { code: 17, place: '桃园市' },
  J: { code: 18, place: '新竹县' },
  K: { code: 19, place: '苗栗县' },
  L: { code: 20, place: '台中县' },
  M: { code: 21, place: '南投县' },
  N: { code: 22, place: '彰化县' },
  P: { code: 23, place: '云林县' },
  Q: { code: 24, place: '嘉义县' },
  R: { code: 25, place: '台南县' },
  S: { code: 26, place: '高雄县' },
  T: { code: 27, place: '屏东县' },
  U: { code: 28, place: '花莲县' },
  V: { code: 29, place: '台东县' },
  X: { code: 30, place: '澎湖县' },
  Y: { code: 31, place: '阳明山管理局' },
  W: { code: 32, place: '金门县' },
  Z: { code: 33, place: '连江县' },
  I: { code: 34, place: '嘉义市' },
  O: { code: 35, place: '新竹市' },
};
