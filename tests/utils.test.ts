import { describe, it, expect, vi } from 'vitest';
import {
    boxFromCorners,
    contains,
    intersects,
    multiplyMatrices,
    transformBox,
    transformPoint,
    unionBoxes,
    type Matrix,
} from '../src/utils/geometry.js';
import { hashBuffer, shortHash } from '../src/utils/hash.js';
import { createEventEmitter } from '../src/utils/events.js';
import { createLogger, withContext } from '../src/utils/logger.js';

describe('Utilities', () => {
    describe('geometry', () => {
        it('should treat touching edges as disjoint', () => {
            const a = { x: 0, y: 0, width: 10, height: 10 };
            expect(intersects(a, { x: 10, y: 0, width: 5, height: 5 })).toBe(false);
            expect(intersects(a, { x: 9.5, y: 9.5, width: 5, height: 5 })).toBe(true);
        });

        it('should treat zero-area boxes as disjoint', () => {
            expect(intersects({ x: 0, y: 0, width: 10, height: 10 }, { x: 5, y: 5, width: 0, height: 3 })).toBe(false);
        });

        it('should normalise corners given in any order', () => {
            expect(boxFromCorners(10, 20, 0, 5)).toEqual({ x: 0, y: 5, width: 10, height: 15 });
        });

        it('should apply the first matrix before the second', () => {
            const scale: Matrix = [2, 0, 0, 2, 0, 0];
            const move: Matrix = [1, 0, 0, 1, 10, 20];
            expect(transformPoint(multiplyMatrices(scale, move), 1, 1)).toEqual([12, 22]);
            expect(transformPoint(multiplyMatrices(move, scale), 1, 1)).toEqual([22, 42]);
        });

        it('should bound a rotated box', () => {
            const rotate90: Matrix = [0, 1, -1, 0, 0, 0];
            expect(transformBox(rotate90, { x: 0, y: 0, width: 10, height: 5 })).toEqual({
                x: -5,
                y: 0,
                width: 5,
                height: 10,
            });
        });

        it('should check containment and union', () => {
            const outer = { x: 0, y: 0, width: 100, height: 100 };
            expect(contains(outer, { x: 10, y: 10, width: 90, height: 90 })).toBe(true);
            expect(contains(outer, { x: 10, y: 10, width: 91, height: 5 })).toBe(false);
            expect(unionBoxes([])).toBeUndefined();
            expect(unionBoxes([
                { x: 0, y: 0, width: 1, height: 1 },
                { x: 5, y: -2, width: 1, height: 1 },
            ])).toEqual({ x: 0, y: -2, width: 6, height: 3 });
        });
    });

    describe('hash', () => {
        it('should hash bytes with SHA-256', () => {
            expect(hashBuffer(new TextEncoder().encode('abc'))).toBe(
                'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
            );
        });

        it('should shorten hashes', () => {
            expect(shortHash('0123456789abcdef')).toBe('01234567');
            expect(shortHash('0123456789abcdef', 4)).toBe('0123');
        });
    });

    describe('events', () => {
        it('should deliver typed payloads', () => {
            const events = createEventEmitter();
            const listener = vi.fn();
            events.on('document:start', listener);
            events.emit('document:start', { filename: 'a.pdf' });
            events.off('document:start', listener);
            events.emit('document:start', { filename: 'b.pdf' });

            expect(listener).toHaveBeenCalledTimes(1);
            expect(listener).toHaveBeenCalledWith({ filename: 'a.pdf' });
        });
    });

    describe('createLogger', () => {
        it('should route entries to a custom logger', () => {
            const customLogger = vi.fn();
            const logger = createLogger({ level: 'info', structured: true, customLogger });

            logger.warn('Region skipped', { filename: 'a.pdf' });

            expect(customLogger).toHaveBeenCalledWith('warn', 'Region skipped', { filename: 'a.pdf' });
        });

        it('should keep an explicit correlation id', () => {
            const customLogger = vi.fn();
            const logger = createLogger({ level: 'debug', structured: true, customLogger });

            logger.debug('Stage transition', { correlationId: 'explicit' });

            expect(customLogger).toHaveBeenCalledWith('debug', 'Stage transition', { correlationId: 'explicit' });
        });

        it('should add bound context to every entry', () => {
            const customLogger = vi.fn();
            const logger = withContext(
                createLogger({ level: 'info', structured: true, customLogger }),
                { correlationId: 'pdfc_bound' }
            );

            logger.info('Run completed', { processed: 2 });
            logger.error('Document failed', { correlationId: 'override' });

            expect(customLogger).toHaveBeenNthCalledWith(1, 'info', 'Run completed', {
                correlationId: 'pdfc_bound',
                processed: 2,
            });
            expect(customLogger).toHaveBeenNthCalledWith(2, 'error', 'Document failed', { correlationId: 'override' });
        });
    });
});
