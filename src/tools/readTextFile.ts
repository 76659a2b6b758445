import fs from "fs";
import {hasErrorCode} from "./errorWithCode";

const BOM = '\uFEFF';

export const isFile = (filename: string) => {
  try {
    const stat = fs.statSync(filename, {throwIfNoEntry: false});
    return !!stat && stat.isFile();
  } catch (error) {
    if (hasErrorCode(error, 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
};

const readTextFile = (filename: string) => {
  const text = fs.readFileSync(filename).toString('utf8');
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
};

export default readTextFile;
