export interface ProvinceLookup {
  province(code: string): string | undefined;
}

export interface RegionRegistry {
  lookup(code: string): string | undefined;
  contains(code: string): boolean;
  randomCode(): string;
  randomCodeWithPrefix(prefix: string): string | undefined;
}
