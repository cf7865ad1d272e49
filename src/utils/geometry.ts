/**
 * Axis-aligned rectangle in PDF user space (origin bottom-left, y up)
 */
export interface BoundingBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * PDF transformation matrix [a b c d e f], row-vector convention:
 * x' = a·x + c·y + e, y' = b·x + d·y + f
 */
export type Matrix = readonly [number, number, number, number, number, number];

export const IDENTITY_MATRIX: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * Product m1 × m2: applies m1 first, then m2
 */
export function multiplyMatrices(m1: Matrix, m2: Matrix): Matrix {
    const [a1, b1, c1, d1, e1, f1] = m1;
    const [a2, b2, c2, d2, e2, f2] = m2;
    return [
        a1 * a2 + b1 * c2,
        a1 * b2 + b1 * d2,
        c1 * a2 + d1 * c2,
        c1 * b2 + d1 * d2,
        e1 * a2 + f1 * c2 + e2,
        e1 * b2 + f1 * d2 + f2,
    ];
}

export function translationMatrix(tx: number, ty: number): Matrix {
    return [1, 0, 0, 1, tx, ty];
}

export function transformPoint(m: Matrix, x: number, y: number): [number, number] {
    return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

/**
 * Bounding box of a rectangle after transformation
 */
export function transformBox(m: Matrix, box: BoundingBox): BoundingBox {
    const corners = [
        transformPoint(m, box.x, box.y),
        transformPoint(m, box.x + box.width, box.y),
        transformPoint(m, box.x, box.y + box.height),
        transformPoint(m, box.x + box.width, box.y + box.height),
    ];
    return boxFromPoints(corners);
}

export function boxFromPoints(points: ReadonlyArray<readonly [number, number]>): BoundingBox {
    const xs = points.map(([x]) => x);
    const ys = points.map(([, y]) => y);
    const minX = Math.min(...xs);
    const minY = Math.min(...ys);
    return {
        x: minX,
        y: minY,
        width: Math.max(...xs) - minX,
        height: Math.max(...ys) - minY,
    };
}

/**
 * Box from two opposite corners, in any order
 */
export function boxFromCorners(x1: number, y1: number, x2: number, y2: number): BoundingBox {
    return boxFromPoints([[x1, y1], [x2, y2]]);
}

/**
 * True when the two boxes share an area greater than zero.
 * Boxes that only touch along an edge do not intersect.
 */
export function intersects(a: BoundingBox, b: BoundingBox): boolean {
    return (
        a.x < b.x + b.width &&
        b.x < a.x + a.width &&
        a.y < b.y + b.height &&
        b.y < a.y + a.height
    );
}

export function intersectsAny(box: BoundingBox, others: readonly BoundingBox[]): boolean {
    return others.some((other) => intersects(box, other));
}

const CONTAINMENT_EPSILON = 1e-6;

export function contains(outer: BoundingBox, inner: BoundingBox): boolean {
    return (
        inner.x >= outer.x - CONTAINMENT_EPSILON &&
        inner.y >= outer.y - CONTAINMENT_EPSILON &&
        inner.x + inner.width <= outer.x + outer.width + CONTAINMENT_EPSILON &&
        inner.y + inner.height <= outer.y + outer.height + CONTAINMENT_EPSILON
    );
}

export function unionBoxes(boxes: readonly BoundingBox[]): BoundingBox | undefined {
    if (boxes.length === 0) {
        return undefined;
    }
    return boxFromPoints(
        boxes.flatMap((box): Array<[number, number]> => [
            [box.x, box.y],
            [box.x + box.width, box.y + box.height],
        ])
    );
}

export function centerY(box: BoundingBox): number {
    return box.y + box.height / 2;
}
