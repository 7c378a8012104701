// Decoy-state QKD link simulator - Public API

export * from './core';
export * from './config';
export * from './source/state-generator';
export * from './channel/channel-effects';
export * from './detection/detection-handler';
export * from './sync/preprocessor';
export * from './sync/correlation';
export * from './analysis/statistics';
export * from './simulator';
export { SeededRandom } from './utils/random';
export { meanAndStd, calculateErrorRate, ratio } from './utils';
