import AssetResolver, {getAssetResolver} from './assetResolver';
import splitLines from './tools/splitLines';
import splitFields from './tools/splitFields';
import paginateText from './tools/paginateText';
import {appConfig} from './appConfig';

export function readText(file: string, resolver: AssetResolver = getAssetResolver()) {
  return resolver.resolveText(file);
}

export function readLines(file: string, resolver: AssetResolver = getAssetResolver()) {
  return splitLines(readText(file, resolver));
}

export function readCsv(file: string, delimiter = ',', resolver: AssetResolver = getAssetResolver()) {
  return splitFields(readLines(file, resolver), delimiter);
}

export function readPages(file: string, maxChar = appConfig.pageMaxChars, resolver: AssetResolver = getAssetResolver()) {
  return paginateText(readText(file, resolver), maxChar);
}
