/*
 * Public API Surface of @drilldown/core
 */

// =================== TYPES ===================
export * from './lib/types/tree-path';
export * from './lib/types/tree-zone';
export * from './lib/types/row-animation';
export * from './lib/types/row-list';
export * from './lib/types/tree-source-config';
export * from './lib/types/tree-source-data';
export * from './lib/types/tree-source-errors';
export * from './lib/types/tree-source-events';

// =================== ENGINE ===================
export * from './lib/engine/types';
export * from './lib/engine/navigation-state';
export * from './lib/engine/zone-layout';
export * from './lib/engine/zone-reconciler';
export * from './lib/engine/zone-row-list';
export * from './lib/engine/tree-source-view';

// =================== UTILITIES ===================
export * from './lib/utils/path-utils';
export * from './lib/utils/object-tree-source';
