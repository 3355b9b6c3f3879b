/**
 * Build-time removal of disabled assertion sites
 */

export { createElisionTransformer, conditionText, DEFAULT_CALLEE_NAMES, DEFAULT_LEVEL_NAMES } from './transformer'
export type { ElisionOptions } from './transformer'
export { stripSource, transpileWithElision } from './strip'
export type { StripOptions, StripResult } from './strip'
export { tripwireEsbuildPlugin, loadWithElision } from './esbuild-plugin'
export type { ElisionPluginOptions } from './esbuild-plugin'
export { stripFiles, collectSourceFiles } from './files'
export type { StripFilesOptions, StripFilesSummary } from './files'
