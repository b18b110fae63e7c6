// @orcbatch/memory-engine
// In-process implementation of the columnar engine contract

export { MemoryEngine, type MemoryEngineOptions, type StoredFileInfo } from './memory-engine.js';
