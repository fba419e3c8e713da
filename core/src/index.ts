export * from './types';
export * from './errors';
export * from './config';
export * from './dsp/stats';
export * from './audio/wav';
export * from './audio/resample';
export * from './audio/decoder';
export * from './audio/ffmpeg';
export * from './audio/trim';
export * from './audio/normalize';
export * from './embedding/lock';
export * from './embedding/model';
export * from './embedding/spectral';
export * from './embedding/remote';
export * from './scoring/align';
export * from './scoring/distance';
export * from './scoring/calibrate';
export * from './scoring/preview';
export * from './engine/engine';
export * from './engine/session';

import { ShadowingScoringEngine } from './engine/engine';

export default ShadowingScoringEngine;
