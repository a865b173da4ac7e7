// SCDL Complex Algebra
// Pure operations combining complexes: union, glue, join, pick_vert

import { Complex, type Simplex, type VertexName } from "./complex.ts";
import { SCDLError } from "./errors.ts";
import { UnionFind } from "./union-find.ts";

/** Ordered glue pairs: vertex of the first complex → vertex of the second. */
export type VertexMapping = readonly (readonly [VertexName, VertexName])[];

//==============================================================================
// Helpers
//==============================================================================

/**
 * Replace every vertex by its representative. The image must keep the
 * simplex's cardinality.
 */
function canonicalize(
	simplex: Simplex,
	uf: UnionFind<VertexName>,
	context: string,
): Simplex {
	const canon = [...new Set(simplex.map((v) => uf.find(v)))];
	if (canon.length !== simplex.length) {
		throw SCDLError.degenerateSimplex(context, simplex, canon);
	}
	return canon;
}

function canonicalizeAll(
	simplices: Iterable<Simplex>,
	uf: UnionFind<VertexName>,
	context: string,
): Simplex[] {
	const out: Simplex[] = [];
	for (const s of simplices) out.push(canonicalize(s, uf, context));
	return out;
}

//==============================================================================
// union
//==============================================================================

export function union(k1: Complex, k2: Complex): Complex {
	const inK2 = new Set(k2.vertices);
	const common = k1.vertices.filter((v) => inK2.has(v));

	for (let i = 0; i < common.length; i++) {
		for (let j = i + 1; j < common.length; j++) {
			const v = common[i];
			const w = common[j];
			if (v === undefined || w === undefined) continue;
			if (k1.identifies(v, w) !== k2.identifies(v, w)) {
				throw SCDLError.incompatibleIdentification(
					"union",
					v + " and " + w + " are equivalent in one complex but not the other",
				);
			}
		}
	}

	const uf = k1.uf.merge(k2.uf);
	const simplices = canonicalizeAll(
		[...k1.maximalSimplices, ...k2.maximalSimplices],
		uf,
		"union",
	);
	return new Complex(simplices, uf);
}

//==============================================================================
// glue
//==============================================================================

function resolveIn(k: Complex, v: VertexName, operand: "first" | "second"): VertexName {
	if (!k.uf.has(v)) throw SCDLError.vertexNotFound(v, operand);
	const rep = k.uf.find(v);
	if (!k.hasVertex(rep)) throw SCDLError.vertexNotFound(v, operand);
	return rep;
}

function checkClassMapping(pairs: readonly (readonly [VertexName, VertexName])[]): void {
	const forward = new Map<VertexName, VertexName>();
	const backward = new Map<VertexName, VertexName>();
	for (const [ra, rb] of pairs) {
		const target = forward.get(ra);
		if (target !== undefined && target !== rb) {
			throw SCDLError.conflictingMapping(
				"class '" + ra + "' is mapped to two different targets: " + target + " and " + rb,
			);
		}
		const source = backward.get(rb);
		if (source !== undefined && source !== ra) {
			throw SCDLError.conflictingMapping(
				"classes '" + source + "' and '" + ra + "' are both mapped to '" + rb + "'",
			);
		}
		forward.set(ra, rb);
		backward.set(rb, ra);
	}
}

function checkConsistency(k1: Complex, k2: Complex, mapping: VertexMapping): void {
	for (let i = 0; i < mapping.length; i++) {
		for (let j = i + 1; j < mapping.length; j++) {
			const first = mapping[i];
			const second = mapping[j];
			if (first === undefined || second === undefined) continue;
			const [a1, b1] = first;
			const [a2, b2] = second;
			const eq1 = k1.identifies(a1, a2);
			const eq2 = k2.identifies(b1, b2);
			if (eq1 !== eq2) {
				throw SCDLError.incompatibleIdentification(
					"glue",
					a1 + "~" + a2 + " is " + (eq1 ? "" : "not ") + "true in the first complex but " +
						b1 + "~" + b2 + " is " + (eq2 ? "" : "not ") + "true in the second",
				);
			}
		}
	}
}

/**
 * Glue k2 onto k1 by identifying each mapped pair. Any member of a class may
 * name that class on either side.
 */
export function glue(k1: Complex, k2: Complex, mapping: VertexMapping): Complex {
	const resolved = mapping.map(
		([a, b]) => [resolveIn(k1, a, "first"), resolveIn(k2, b, "second")] as const,
	);
	checkClassMapping(resolved);
	checkConsistency(k1, k2, mapping);

	const uf = k1.uf.merge(k2.uf);
	for (const [a, b] of mapping) uf.union(a, b);

	const simplices = canonicalizeAll(
		[...k1.maximalSimplices, ...k2.maximalSimplices],
		uf,
		"glue",
	);
	return new Complex(simplices, uf);
}

//==============================================================================
// join
//==============================================================================

export function join(k1: Complex, k2: Complex): Complex {
	const uf = k1.uf.merge(k2.uf);
	const simplices: Simplex[] = [];
	for (const s of k1.maximalSimplices) {
		for (const t of k2.maximalSimplices) {
			const combined = [...new Set([...s, ...t])];
			simplices.push(canonicalize(combined, uf, "join"));
		}
	}
	return new Complex(simplices, uf);
}

//==============================================================================
// pick_vert
//==============================================================================

/**
 * The most recently declared vertex of c as a one-vertex complex that keeps
 * the vertex's whole identification class. Vertices missing from `order`
 * lose to every registered vertex.
 */
export function pickVertex(c: Complex, order: ReadonlyMap<VertexName, number>): Complex {
	const vertices = c.vertices;
	let picked: VertexName | undefined;
	let best = -Infinity;
	for (const v of vertices) {
		const index = order.get(v) ?? -Infinity;
		if (picked === undefined || index > best) {
			picked = v;
			best = index;
		}
	}
	if (picked === undefined) throw SCDLError.emptyComplex();

	const rep = c.uf.find(picked);
	const uf = new UnionFind<VertexName>();
	uf.add(rep);
	for (const w of c.uf.classOf(rep)) uf.union(rep, w);
	return new Complex([[rep]], uf);
}
