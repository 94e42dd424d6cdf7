export { assembleBundle, collectEntries, renderBundle, renderPathList, PATHS_HEADER, CONTENTS_HEADER } from './assembler.js';
export type { AssembleOptions, BundleEntry } from './assembler.js';
export { applyTemplate, loadTemplate, writeOutput, copyToClipboard, TEMPLATE_MARKER } from './output.js';
export { buildBundle } from './build.js';
export type { BuildOptions, BuildResult } from './build.js';
