import path from "path";
import {AssetLookup} from '../types';
import readTextFile, {isFile} from '../tools/readTextFile';

/**
 * Looks a file up relative to a base directory,
 * e.g. the writable data directory or the bundled assets directory.
 */
class DirectoryLookup implements AssetLookup {
  constructor(public id: string, public name: string, public baseDir: string) {}

  find(file: string) {
    if (!file) return null;

    const filename = path.join(this.baseDir, file);
    if (!isFile(filename)) {
      return null;
    }
    return readTextFile(filename);
  }
}

export default DirectoryLookup;
