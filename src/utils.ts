export type RandomSource = () => number;

export function isPositiveInteger(value:number) {
    return Number.isSafeInteger(value) && value > 0;
}
// Uniform integer in [min, max], both inclusive
export function randomInt(random:RandomSource, min:number, max:number) {
    return min + Math.floor(random() * (max - min + 1));
}
export function pick<T>(random:RandomSource, items:readonly [T, ...T[]]):T;
export function pick<T>(random:RandomSource, items:readonly T[]):T|null;
export function pick<T>(random:RandomSource, items:readonly T[]) {
    if (items.length === 0) {
        return null;
    }
    return items[Math.floor(random() * items.length)];
}
