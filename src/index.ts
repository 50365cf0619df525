/**
 * dichroma - protan-type color vision deficiency simulation and correction
 */

export * from './color/ColorTypes';
export * from './color/Matrix3';
export * from './color/ColorSpaceConverter';
export * from './color/TransformSpec';
export * from './color/ColorImage';
export * from './color/DichromacySimulator';
export * from './color/ColorCorrector';
export * from './color/PixelPipeline';
export * from './color/ComparisonGrid';
export * from './color/CorrectionPresets';
export * from './config';
export * from './core/errors';
export { Logger, LogLevel, parseLogLevel, type LogSink } from './utils/Logger';
