import path from 'path';
import {AssetLookup} from './types';
import ErrorWithCode from './tools/errorWithCode';
import TimeCache from './tools/timeCache';
import ExactPathLookup from './lookups/exactPath';
import DirectoryLookup from './lookups/directory';
import EmbeddedResources from './lookups/embeddedResources';
import {appConfig} from './appConfig';
import {getDebug} from './tools/getDebug';

const debug = getDebug('gameText:AssetResolver');

export class AssetNotFoundError extends ErrorWithCode {
  constructor(public file: string, public tried: string[]) {
    super(`Asset is not found: ${file}`, 'ASSET_NOT_FOUND');
    this.name = 'AssetNotFoundError';
  }
}

export interface AssetResolverOptions {
  cacheTtlMs?: number;
  cacheMaxSize?: number;
}

class AssetResolver {
  private cache: TimeCache<string, string> | null = null;

  constructor(public lookups: AssetLookup[], options: AssetResolverOptions = {}) {
    const {cacheTtlMs = 0, cacheMaxSize = appConfig.cacheMaxSize} = options;
    if (cacheTtlMs > 0) {
      this.cache = new TimeCache<string, string>({maxSize: cacheMaxSize, ttl: cacheTtlMs});
    }
  }

  tryResolveText(nameOrPath: string) {
    if (!nameOrPath) return null;

    // relative names depend on the working directory
    const cacheKey = path.resolve(nameOrPath);
    if (this.cache) {
      const cached = this.cache.get(cacheKey);
      if (cached !== undefined) {
        return cached;
      }
    }

    for (const lookup of this.lookups) {
      const text = lookup.find(nameOrPath);
      if (text !== null) {
        debug('Resolved %s by %s', nameOrPath, lookup.id);
        if (this.cache) {
          this.cache.set(cacheKey, text);
        }
        return text;
      }
    }

    return null;
  }

  resolveText(nameOrPath: string) {
    const text = this.tryResolveText(nameOrPath);
    if (text === null) {
      const tried = this.lookups.map((lookup) => lookup.id);
      debug('Asset %s is not found, tried: %o', nameOrPath, tried);
      throw new AssetNotFoundError(nameOrPath, tried);
    }
    return text;
  }

  clearCache() {
    if (this.cache) {
      this.cache.clear();
    }
  }
}

export interface CreateAssetResolverOptions extends AssetResolverOptions {
  dataDir?: string;
  bundledDir?: string;
  manifestPath?: string;
  resources?: Record<string, string> | EmbeddedResources;
}

export function createAssetResolver(options: CreateAssetResolverOptions = {}) {
  const {dataDir, bundledDir, manifestPath, resources, ...resolverOptions} = options;

  const lookups: AssetLookup[] = [new ExactPathLookup()];
  if (dataDir) {
    lookups.push(new DirectoryLookup('dataDir', 'Writable data directory', dataDir));
  }
  if (bundledDir) {
    lookups.push(new DirectoryLookup('bundledDir', 'Bundled assets directory', bundledDir));
  }

  const embedded = resources instanceof EmbeddedResources ? resources : new EmbeddedResources(resources);
  if (manifestPath) {
    embedded.loadManifest(manifestPath);
  }
  lookups.push(embedded);

  return new AssetResolver(lookups, resolverOptions);
}

let defaultResolver: AssetResolver | null = null;

export function getAssetResolver() {
  if (!defaultResolver) {
    defaultResolver = createAssetResolver({
      dataDir: appConfig.dataDir,
      bundledDir: appConfig.bundledDir,
      manifestPath: appConfig.manifestPath,
      cacheTtlMs: appConfig.cacheTtlMs,
    });
  }
  return defaultResolver;
}

export default AssetResolver;
