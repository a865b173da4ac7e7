// SCDL Observational Domain
// Integer-valued invariants of a complex

import { bettiNumber } from "../homology.ts";
import {
	type ObservationalOperator,
	type OperatorRegistry,
	createRegistry,
} from "./registry.ts";

const dim: ObservationalOperator = {
	kind: "observational",
	name: "dim",
	params: ["complex"],
	fn: (c) => c.dimension,
};

const numVert: ObservationalOperator = {
	kind: "observational",
	name: "num_vert",
	params: ["complex"],
	fn: (c) => c.numVertices,
};

// counts every face, not only maximal ones
const numSimplices: ObservationalOperator = {
	kind: "observational",
	name: "num_simplices",
	params: ["complex"],
	fn: (c) => c.numSimplices,
};

// betti(K, k): rank of H_k over GF(2)
const betti: ObservationalOperator = {
	kind: "observational",
	name: "betti",
	params: ["complex", "int"],
	fn: (c, k = 0) => bettiNumber(c, k),
};

export function createObservationalRegistry(): OperatorRegistry {
	return createRegistry(dim, numVert, numSimplices, betti);
}
