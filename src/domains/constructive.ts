// SCDL Constructive Domain
// Operators producing complexes

import { glue, join, pickVertex, union } from "../algebra.ts";
import {
	type ConstructiveOperator,
	type OperatorRegistry,
	createRegistry,
} from "./registry.ts";

const unionOp: ConstructiveOperator = { kind: "constructive", shape: "fold", name: "union", fn: union };

const joinOp: ConstructiveOperator = { kind: "constructive", shape: "fold", name: "join", fn: join };

const glueOp: ConstructiveOperator = { kind: "constructive", shape: "glue", name: "glue", fn: glue };

const pickVertOp: ConstructiveOperator = {
	kind: "constructive",
	shape: "pick",
	name: "pick_vert",
	fn: pickVertex,
};

export function createConstructiveRegistry(): OperatorRegistry {
	return createRegistry(unionOp, joinOp, glueOp, pickVertOp);
}
