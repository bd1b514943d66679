/**
 * Core utilities for OOXML document processing
 */

export * from './namespaces';
export * from './xml';
export * from './package';
export * from './hash';
export * from './errors';
export * from './logger';
export * from './output';
