/**
 * Storage Module
 * File-backed persistence shared by the RAG stores
 */

export { RealFileSystem, InMemoryFileSystem, isNotFoundError, type FileSystem } from './FileSystem';
export { JSONFile, JSONLFile } from './JSONFile';
export { WriteQueue } from './WriteQueue';
