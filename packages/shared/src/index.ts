export {
  spawnAsync,
  spawnBuffer,
  type SpawnAsyncOptions,
  type SpawnBufferResult,
  type SpawnResult,
} from './utils/spawn-utils';
