import { EventEmitter } from 'events';
import type { CensorOutcome, RunSummary } from '../types/document.types.js';
import type { DocumentStageEnumType, FailedVerdictType } from '../types/enums.js';

/**
 * Event types emitted by pdf-censor
 */
export interface PdfCensorEvents {
    // Document events
    'document:start': { filename: string; documentId?: string };
    'document:stage': { filename: string; documentId: string; stage: DocumentStageEnumType };
    'document:complete': { filename: string; documentId: string; outputPath?: string };
    'document:rejected': { filename: string; documentId: string; verdict: FailedVerdictType; reason: string };
    'document:error': { filename: string; stage: DocumentStageEnumType; error: Error };

    // Batch events
    'batch:outcome': CensorOutcome;
    'batch:complete': RunSummary;
}

/**
 * Type-safe event emitter for pdf-censor
 */
export class PdfCensorEventEmitter extends EventEmitter {
    emit<K extends keyof PdfCensorEvents>(
        event: K,
        data: PdfCensorEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof PdfCensorEvents>(
        event: K,
        listener: (data: PdfCensorEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PdfCensorEvents>(
        event: K,
        listener: (data: PdfCensorEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PdfCensorEvents>(
        event: K,
        listener: (data: PdfCensorEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): PdfCensorEventEmitter {
    return new PdfCensorEventEmitter();
}
