export { tokenize, type Token, type ComparisonOperator, type ArithmeticOperator } from './tokenizer.js';
export { parseExpression, type Expr } from './parser.js';
export { compilePredicate, type CompiledPredicate } from './evaluator.js';
