import 'dotenv/config';

const {
  ASSETS_DATA_DIR = '',
  ASSETS_BUNDLED_DIR = '',
  ASSETS_MANIFEST = '',
  ASSETS_CACHE_TTL_SECONDS = '',
  PAGE_MAX_CHARS = '',
} = process.env;

export const appConfig = {
  dataDir: ASSETS_DATA_DIR,
  bundledDir: ASSETS_BUNDLED_DIR,
  manifestPath: ASSETS_MANIFEST,
  cacheTtlMs: (Number(ASSETS_CACHE_TTL_SECONDS) || 0) * 1000,
  cacheMaxSize: 100,
  pageMaxChars: PAGE_MAX_CHARS === '' ? 120 : Number(PAGE_MAX_CHARS),
};
