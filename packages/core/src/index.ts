// Public API - used by the CLI and any other front end
export * from './config/index.js';
export * from './errors.js';
export * from './findings.js';
export * from './check-runner.js';
export * from './workspace.js';
export * from './query.js';
export * from './diff-utils.js';

// Editing
export * from './editors/apply.js';
export * from './editors/comment-editor.js';
export * from './editors/json-editor.js';
export * from './editors/edit-queue.js';
export * from './utils/atomic-write.js';

// Internal API - Implementation details (not recommended for external use)
export * from './file-checker.js';
export * from './cross-checker.js';
export * from './locale-table.js';
export * from './directives.js';
export * from './key-resolver.js';
export { parseSource, type ParseFailure, type SourceUnit } from './parsers/source-parser.js';
export * from './parsers/json-document.js';
export { expandKeyPattern, isKeyPattern } from './utils/key-patterns.js';
