export { getTemporaryPath, writeFileAtomic } from './utils/atomic-file-writer';
