export { ExtractorRegistry, createDefaultRegistry } from './registry';
export type { Extractor, ExtractionContext } from './interfaces';
export { importEdges } from './interfaces';
export { JsExtractor, collectSpecifiers } from './js-extractor';
export { GlobImportExtractor, collectGlobPatterns } from './glob-import-extractor';
export { HtmlExtractor, collectScriptSources } from './html-extractor';
export { MdxExtractor, collectMdxImports } from './mdx-extractor';
export { IndexExtractor } from './index-extractor';
export {
    PackageJsonExtractor,
    PackageManifestSchema,
    readPackageManifest,
    manifestDependencies,
    isWorkspaceVersion,
} from './package-json';
export type { PackageManifest } from './package-json';
export { SOURCE_EXTENSIONS, isSourceFile } from './config';
