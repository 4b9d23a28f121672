export const DEFAULT_GRID_RESOLUTION = 50;

// Cost is 2·n² engine calls; beyond a few hundred points per axis the sweep stops being interactive.
export const MAX_GRID_RESOLUTION = 400;

export const SQRT_2PI = Math.sqrt(2 * Math.PI);
