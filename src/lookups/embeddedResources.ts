import * as s from 'superstruct';
import {AssetLookup} from '../types';
import ErrorWithCode from '../tools/errorWithCode';
import readTextFile from '../tools/readTextFile';
import {getDebug} from '../tools/getDebug';

const debug = getDebug('gameText:EmbeddedResources');

const ManifestStruct = s.object({
  resources: s.record(s.string(), s.string()),
});

/**
 * In-memory registry of text resources addressed by name.
 * A name is a slash separated path without extension, e.g. `dialogues/intro`.
 */
class EmbeddedResources implements AssetLookup {
  id = 'embedded';
  name = 'Embedded resources';
  private resources = new Map<string, string>();

  constructor(resources?: Record<string, string>) {
    if (resources) {
      Object.entries(resources).forEach(([name, text]) => this.register(name, text));
    }
  }

  register(name: string, text: string) {
    this.resources.set(normalizeName(name), text);
    return this;
  }

  loadManifest(manifestPath: string) {
    const text = readTextFile(manifestPath);

    let manifest: s.Infer<typeof ManifestStruct>;
    try {
      manifest = s.mask(JSON.parse(text), ManifestStruct);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ErrorWithCode(`Invalid manifest ${manifestPath}: ${message}`, 'INVALID_MANIFEST');
    }

    const names = Object.keys(manifest.resources);
    names.forEach((name) => this.register(name, manifest.resources[name]));
    debug('Loaded %d resources from %s', names.length, manifestPath);
    return this;
  }

  has(name: string) {
    return this.find(name) !== null;
  }

  get size() {
    return this.resources.size;
  }

  find(file: string) {
    const name = normalizeName(file);
    if (!name) return null;

    let text = this.resources.get(name);
    if (text === undefined) {
      text = this.resources.get(stripExtension(name));
    }
    return text === undefined ? null : text;
  }
}

function normalizeName(name: string) {
  return name.replace(/\\/g, '/').replace(/^\/+/, '');
}

function stripExtension(name: string) {
  return name.replace(/\.[^./]*$/, '');
}

export default EmbeddedResources;
