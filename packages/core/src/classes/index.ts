export { ClassAlgebra, compare, union, intersection, difference } from './ClassAlgebra.js';
export type { ClassExpression, Conjunctor, GlyphPredicate, PredicateNode, AlgebraEnvironment } from './ClassAlgebra.js';
export { binGlyphsByMetric, binAverages } from './binning.js';
