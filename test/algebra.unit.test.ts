// SCDL Complex Algebra - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { glue, join, pickVertex, union } from "../src/algebra.ts";
import { Complex, simplexKey } from "../src/complex.ts";
import { ErrorCodes } from "../src/errors.ts";
import { UnionFind } from "../src/union-find.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const lit = (...vertices: string[]): Complex => Complex.fromVertices(vertices);

function keys(c: Complex): string[] {
	return c.maximalSimplices.map(simplexKey).sort();
}

/** Points a and b, already identified. */
function identifiedPoints(): Complex {
	const uf = new UnionFind<string>();
	uf.union("a", "b");
	return new Complex([["a"], ["b"]], uf);
}

// ---------------------------------------------------------------------------
// union
// ---------------------------------------------------------------------------

describe("union", () => {
	it("combines maximal simplices over a shared vertex", () => {
		const u = union(lit("a", "b", "c"), lit("c", "d"));
		assert.equal(u.dimension, 2);
		assert.deepEqual(u.vertices, ["a", "b", "c", "d"]);
		assert.deepEqual(keys(u), [simplexKey(["a", "b", "c"]), simplexKey(["c", "d"])]);
	});

	it("is commutative on disjoint complexes", () => {
		const a = lit("a", "b");
		const b = lit("x", "y", "z");
		const ab = union(a, b);
		const ba = union(b, a);
		assert.deepEqual(keys(ab), keys(ba));
		assert.deepEqual([...ab.vertices].sort(), [...ba.vertices].sort());
	});

	it("rejects shared vertices identified on one side only", () => {
		assert.throws(() => union(identifiedPoints(), lit("a", "b")), {
			code: ErrorCodes.IncompatibleIdentification,
		});
	});

	it("rejects a simplex collapsed by the merged identifications", () => {
		const left = new Complex([["a"]], identifiedPoints().uf.clone());
		assert.throws(() => union(left, lit("a", "b")), {
			code: ErrorCodes.DegenerateSimplex,
			message: "union(): simplex {a, b} collapsed to {a} after vertex identifications",
		});
	});

	it("leaves its operands unchanged", () => {
		const a = lit("a", "b");
		union(a, lit("b", "c"));
		assert.deepEqual(a.uf.nodes(), ["a", "b"]);
	});
});

// ---------------------------------------------------------------------------
// glue
// ---------------------------------------------------------------------------

describe("glue", () => {
	it("identifies mapped vertices and rewrites simplices to representatives", () => {
		const g = glue(lit("a", "b", "c"), lit("d", "e"), [["c", "d"]]);
		assert.equal(g.dimension, 2);
		assert.deepEqual(g.maximalSimplices, [["a", "b", "c"], ["c", "e"]]);
		assert.deepEqual(g.vertices, ["a", "b", "c", "e"]);
		assert.equal(g.classes.size, 4);
		assert.ok(g.identifies("c", "d"));
	});

	it("with an empty mapping matches union on the same operands", () => {
		const k = lit("a", "b", "c");
		const l = lit("c", "d");
		const g = glue(k, l, []);
		const u = union(k, l);
		assert.deepEqual(keys(g), keys(u));
		assert.deepEqual(g.vertices, u.vertices);
	});

	it("accepts any member of a class as its name", () => {
		const g = glue(lit("a", "b", "c"), lit("d", "e"), [["c", "d"]]);
		const h = glue(g, lit("f", "g"), [["d", "f"]]);
		assert.deepEqual(keys(h), [
			simplexKey(["a", "b", "c"]),
			simplexKey(["c", "e"]),
			simplexKey(["c", "g"]),
		].sort());
		assert.ok(h.identifies("d", "f"));
	});

	it("rejects two sources mapped to one target", () => {
		assert.throws(() => glue(lit("a", "b"), lit("d", "e"), [["a", "d"], ["b", "d"]]), {
			code: ErrorCodes.ConflictingMapping,
			message: "glue(): classes 'a' and 'b' are both mapped to 'd'",
		});
	});

	it("rejects one source mapped to two targets", () => {
		assert.throws(() => glue(lit("a", "b"), lit("x", "y"), [["a", "x"], ["a", "y"]]), {
			code: ErrorCodes.ConflictingMapping,
			message: "glue(): class 'a' is mapped to two different targets: x and y",
		});
	});

	it("rejects a source vertex missing from the first complex", () => {
		assert.throws(() => glue(lit("a", "b"), lit("d"), [["z", "d"]]), {
			code: ErrorCodes.VertexNotFound,
			message: "glue(): vertex 'z' is not in the first complex",
		});
	});

	it("rejects a target vertex missing from the second complex", () => {
		assert.throws(() => glue(lit("a", "b"), lit("d"), [["a", "q"]]), {
			code: ErrorCodes.VertexNotFound,
			message: "glue(): vertex 'q' is not in the second complex",
		});
	});

	it("rejects a mapping that collapses a simplex", () => {
		assert.throws(() => glue(lit("a", "b"), lit("b", "c"), [["a", "b"]]), {
			code: ErrorCodes.DegenerateSimplex,
		});
	});
});

// ---------------------------------------------------------------------------
// join
// ---------------------------------------------------------------------------

describe("join", () => {
	it("of two points is an edge", () => {
		const j = join(lit("a"), lit("b"));
		assert.equal(j.dimension, 1);
		assert.deepEqual(j.maximalSimplices, [["a", "b"]]);
	});

	it("takes every pairwise combination of maximal simplices", () => {
		const k = union(lit("a"), lit("b"));
		const j = join(k, lit("c"));
		assert.deepEqual(keys(j), [simplexKey(["a", "c"]), simplexKey(["b", "c"])]);
	});

	it("is associative", () => {
		const a = lit("a");
		const b = lit("b", "c");
		const c = lit("d");
		const left = join(join(a, b), c);
		const right = join(a, join(b, c));
		assert.deepEqual(keys(left), keys(right));
		assert.deepEqual(keys(left), [simplexKey(["a", "b", "c", "d"])]);
	});

	it("with the empty complex is empty", () => {
		assert.equal(join(lit("a"), Complex.empty()).dimension, -1);
	});

	it("rejects combinations collapsed by identifications", () => {
		const left = new Complex([["a"]], identifiedPoints().uf.clone());
		assert.throws(() => join(left, lit("b")), { code: ErrorCodes.DegenerateSimplex });
	});
});

// ---------------------------------------------------------------------------
// pickVertex
// ---------------------------------------------------------------------------

describe("pickVertex", () => {
	it("picks the latest registered vertex", () => {
		const order = new Map([["a", 0], ["b", 1], ["c", 2]]);
		const p = pickVertex(lit("a", "b", "c"), order);
		assert.deepEqual(p.maximalSimplices, [["c"]]);
		assert.equal(p.dimension, 0);
	});

	it("never prefers an unregistered vertex", () => {
		const order = new Map([["a", 5], ["b", 1]]);
		assert.deepEqual(pickVertex(lit("a", "b", "c"), order).maximalSimplices, [["a"]]);
	});

	it("falls back to the first vertex when none is registered", () => {
		assert.deepEqual(pickVertex(lit("x", "y"), new Map()).maximalSimplices, [["x"]]);
	});

	it("keeps the picked vertex's identification class", () => {
		const g = glue(lit("a", "b", "c"), lit("d", "e"), [["c", "d"]]);
		const p = pickVertex(g, new Map([["a", 0], ["b", 1], ["c", 2], ["e", 0]]));
		assert.deepEqual(p.maximalSimplices, [["c"]]);
		assert.ok(p.identifies("c", "d"));
		assert.deepEqual([...p.uf.classOf("c")].sort(), ["c", "d"]);
	});

	it("rejects an empty complex", () => {
		assert.throws(() => pickVertex(Complex.empty(), new Map()), {
			code: ErrorCodes.EmptyComplex,
		});
	});
});
