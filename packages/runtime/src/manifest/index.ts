export { buildManifestDocument, type ManifestBuildOptions } from './build.js';
export { renderManifest, type RenderOptions } from './render.js';
export { renderContainerProperties, formatCreationTime } from './properties.js';
