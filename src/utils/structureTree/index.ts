export { StructureTreeBuilder } from './StructureTreeBuilder';
export type { BuilderState, CreateNodeOptions } from './StructureTreeBuilder';
export { createTable, createList } from './CompositeExpanders';
export { McidAllocator } from './McidAllocator';
export { ContentCorrelator, findMatchingPosition, normalizeCandidateText } from './ContentCorrelator';
export type { CorrelationMatch, CorrelationUnit, NodeLookup } from './ContentCorrelator';
