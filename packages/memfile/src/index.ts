// @bytefill/memfile entry point
export {
  MemoryFile,
  MemoryFileError,
  createMemoryFile,
  defaultDirectories,
  getFile,
  getFilePath,
  type MemoryFileOptions,
} from './memory-file.js';
