/*
 * Public API Surface of @drilldown/lit
 */

export * from './dom-row-list';
export * from './drilldown-lit';
