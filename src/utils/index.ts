export { createLogger, withContext } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { hashBuffer, shortHash } from './hash.js';

export { PdfCensorEventEmitter, createEventEmitter } from './events.js';
export type { PdfCensorEvents } from './events.js';

export {
    IDENTITY_MATRIX,
    multiplyMatrices,
    transformBox,
    boxFromCorners,
    intersects,
    intersectsAny,
    contains,
    unionBoxes,
} from './geometry.js';
export type { BoundingBox, Matrix } from './geometry.js';
