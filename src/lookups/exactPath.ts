import path from "path";
import {AssetLookup} from '../types';
import readTextFile, {isFile} from '../tools/readTextFile';

class ExactPathLookup implements AssetLookup {
  id = 'exactPath';
  name = 'Exact path';

  find(file: string) {
    if (!file) return null;

    const filename = path.resolve(file);
    if (!isFile(filename)) {
      return null;
    }
    return readTextFile(filename);
  }
}

export default ExactPathLookup;
