export { loadWeaveConfig, parseWeaveConfig, defaultConfig, type WeaveConfig } from "./config/weaveYaml.js";
export { buildGraph, dependenciesOf, type GraphOptions } from "./graph/buildGraph.js";
export { detectCycles } from "./graph/detectCycles.js";
export { collectExternalImports, isExternalImport, internalRoots } from "./graph/externalImports.js";
export { resolveImport, type ResolveResult } from "./graph/resolveImport.js";
export { orderModules } from "./graph/topoOrder.js";
export type { DependencyGraph, Edge, ModuleID, ModuleRecord, ModuleTable, OrderingResult } from "./graph/types.js";
export { lineExtractor, scanModule, type DeclarationExtractor, type Extracted } from "./parse/scanModule.js";
export { assembleArtifact } from "./assemble/assembleArtifact.js";
export { renderGraphText, type LabelMode } from "./render/graphText.js";
export { renderDirectoryTree } from "./render/directoryTree.js";
export { packageNotebook, serializeNotebook, type Notebook } from "./render/notebook.js";
export { renderDependencyReport } from "./render/report.js";
export { applyRule, compileRules, defaultRules, type SummaryLevel, type SummaryRule } from "./transform/rules.js";
export { neutralizeRelativeImports, summarize, transformModule } from "./transform/transformContent.js";
export { dependencyReport, loadModules, weave, weaveTable, writeNotebook, writeOutput } from "./pipeline/runWeave.js";
export { ModuleReadError } from "./util/errors.js";
export { setDebugMode } from "./util/logger.js";
