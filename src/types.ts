export interface AssetLookup {
  id: string;
  name: string;
  find(file: string): string | null;
}
