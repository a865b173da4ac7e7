// SCDL Arithmetic Domain
// Integer arithmetic, comparison and logic; truth values are 1 and 0

import {
	type ArithmeticOperator,
	type OperatorRegistry,
	createRegistry,
} from "./registry.ts";

const truth = (b: boolean): number => (b ? 1 : 0);

function binary(name: string, fn: (a: number, b: number) => number): ArithmeticOperator {
	return {
		kind: "arithmetic",
		name,
		arity: 2,
		fn: (a = 0, b = 0) => fn(a, b),
	};
}

const add = binary("add", (a, b) => a + b);
const sub = binary("sub", (a, b) => a - b);
const mul = binary("mul", (a, b) => a * b);

const and = binary("and", (a, b) => truth(a !== 0 && b !== 0));
const or = binary("or", (a, b) => truth(a !== 0 || b !== 0));

const not: ArithmeticOperator = {
	kind: "arithmetic",
	name: "not",
	arity: 1,
	fn: (a = 0) => truth(a === 0),
};

const greater = binary("greater", (a, b) => truth(a > b));
const less = binary("less", (a, b) => truth(a < b));
const leq = binary("leq", (a, b) => truth(a <= b));
const geq = binary("geq", (a, b) => truth(a >= b));

export function createArithmeticRegistry(): OperatorRegistry {
	return createRegistry(add, sub, mul, and, or, not, greater, less, leq, geq);
}
