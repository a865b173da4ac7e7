// SCDL Homology - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { glue, union } from "../src/algebra.ts";
import { Complex } from "../src/complex.ts";
import {
	bettiNumber,
	boundaryMatrix,
	computeHomology,
	eulerCharacteristic,
	kSimplices,
	orderedSimplex,
	rankMod2,
} from "../src/homology.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const lit = (...vertices: string[]): Complex => Complex.fromVertices(vertices);

function unionAll(first: Complex, ...rest: Complex[]): Complex {
	return rest.reduce((acc, k) => union(acc, k), first);
}

function matrix(rows: number[][]): Uint8Array[] {
	return rows.map((row) => Uint8Array.from(row));
}

const hollowTriangle = (): Complex => unionAll(lit("a", "b"), lit("b", "c"), lit("a", "c"));

const hollowTetrahedron = (): Complex =>
	unionAll(lit("a", "b", "c"), lit("a", "b", "d"), lit("a", "c", "d"), lit("b", "c", "d"));

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("rankMod2", () => {
	it("is 0 for an empty matrix", () => {
		assert.equal(rankMod2([]), 0);
	});

	it("counts duplicate rows once", () => {
		assert.equal(rankMod2(matrix([[1, 1], [1, 1]])), 1);
	});

	it("is full for the identity", () => {
		assert.equal(rankMod2(matrix([[1, 0, 0], [0, 1, 0], [0, 0, 1]])), 3);
	});

	it("uses arithmetic modulo 2", () => {
		// the third row is the sum of the first two
		assert.equal(rankMod2(matrix([[1, 0, 1], [0, 1, 1], [1, 1, 0]])), 2);
	});

	it("needs a row swap when the first row has no pivot", () => {
		assert.equal(rankMod2(matrix([[0, 1], [1, 0]])), 2);
	});

	it("does not modify its input", () => {
		const m = matrix([[1, 1], [1, 1]]);
		rankMod2(m);
		assert.deepEqual(m.map((row) => [...row]), [[1, 1], [1, 1]]);
	});
});

describe("orderedSimplex", () => {
	it("sorts by the given vertex order", () => {
		const order = new Map([["c", 0], ["a", 1], ["b", 2]]);
		assert.deepEqual(orderedSimplex(["a", "b", "c"], order), ["c", "a", "b"]);
	});

	it("places unknown vertices last, by name", () => {
		const order = new Map([["b", 0]]);
		assert.deepEqual(orderedSimplex(["z", "y", "b"], order), ["b", "y", "z"]);
	});
});

describe("boundaryMatrix", () => {
	it("maps an edge to both endpoints", () => {
		const m = boundaryMatrix(lit("a", "b"), 1);
		assert.deepEqual(m.map((row) => [...row]), [[1], [1]]);
	});

	it("of a filled triangle's 2-face hits all three edges", () => {
		const m = boundaryMatrix(lit("a", "b", "c"), 2);
		assert.deepEqual(m.map((row) => [...row]), [[1], [1], [1]]);
	});

	it("is empty below dimension 0", () => {
		assert.deepEqual(boundaryMatrix(lit("a"), 0), []);
	});
});

describe("kSimplices", () => {
	it("lists faces of one dimension", () => {
		assert.equal(kSimplices(lit("a", "b", "c"), 1).length, 3);
		assert.deepEqual(kSimplices(lit("a", "b", "c"), 3), []);
	});
});

describe("bettiNumber", () => {
	it("hollow triangle has one component and one loop", () => {
		const t = hollowTriangle();
		assert.equal(bettiNumber(t, 0), 1);
		assert.equal(bettiNumber(t, 1), 1);
	});

	it("filled triangle has no loop", () => {
		const t = lit("a", "b", "c");
		assert.equal(bettiNumber(t, 0), 1);
		assert.equal(bettiNumber(t, 1), 0);
		assert.equal(bettiNumber(t, 2), 0);
	});

	it("counts disjoint components", () => {
		assert.equal(bettiNumber(union(lit("a"), lit("b")), 0), 2);
	});

	it("is 0 outside [0, dim]", () => {
		const t = lit("a", "b", "c");
		assert.equal(bettiNumber(t, -1), 0);
		assert.equal(bettiNumber(t, 3), 0);
		assert.equal(bettiNumber(Complex.empty(), 0), 0);
	});

	it("sees the loop closed by gluing two arcs", () => {
		const top = union(lit("a", "b"), lit("b", "c"));
		const bottom = union(lit("x", "y"), lit("y", "z"));
		const circle = glue(top, bottom, [["a", "x"], ["c", "z"]]);
		assert.equal(bettiNumber(circle, 0), 1);
		assert.equal(bettiNumber(circle, 1), 1);
	});
});

describe("computeHomology", () => {
	it("hollow tetrahedron is a sphere", () => {
		assert.deepEqual([...computeHomology(hollowTetrahedron())], [[0, 1], [1, 0], [2, 1]]);
	});

	it("is empty for the empty complex", () => {
		assert.equal(computeHomology(Complex.empty()).size, 0);
	});
});

describe("eulerCharacteristic", () => {
	it("is 1 for a filled triangle", () => {
		assert.equal(eulerCharacteristic(lit("a", "b", "c")), 1);
	});

	it("is 0 for a hollow triangle", () => {
		assert.equal(eulerCharacteristic(hollowTriangle()), 0);
	});

	it("is 2 for a hollow tetrahedron", () => {
		assert.equal(eulerCharacteristic(hollowTetrahedron()), 2);
	});
});
