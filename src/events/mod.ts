export { EventEmitter, events } from './emitter.js';
export { ConsoleProgressListener } from './listeners/console.js';
export { MatrixProgressListener } from './listeners/matrix.js';
export type { EventListener, ProgressEvent } from './types.js';
