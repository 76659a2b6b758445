export {default as AssetResolver, AssetNotFoundError, createAssetResolver, getAssetResolver} from './assetResolver';
export type {AssetResolverOptions, CreateAssetResolverOptions} from './assetResolver';
export type {AssetLookup} from './types';
export {default as ExactPathLookup} from './lookups/exactPath';
export {default as DirectoryLookup} from './lookups/directory';
export {default as EmbeddedResources} from './lookups/embeddedResources';
export {readText, readLines, readCsv, readPages} from './textReader';
export {default as paginateText} from './tools/paginateText';
export {default as splitLines} from './tools/splitLines';
export {default as splitFields} from './tools/splitFields';
export {default as ErrorWithCode} from './tools/errorWithCode';
export {appConfig} from './appConfig';
