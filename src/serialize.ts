// SPDX-License-Identifier: MIT
// SCDL Serialization
// Complex data for API and visualization layers

import { type Complex, type VertexName, faces, simplexKey } from "./complex.ts";
import { type Environment, type State, access } from "./env.ts";
import type { ComplexJSON } from "./types.ts";

export function serializeComplex(c: Complex): ComplexJSON {
	const classes: Record<string, string[]> = {};
	for (const [rep, members] of c.classes) {
		classes[rep] = [...members];
	}
	return {
		dimension: c.dimension,
		simplices: c.maximalSimplices.map((s) => [...s]),
		vertices: c.vertices,
		classes,
	};
}

/** Every identifier bound to a store address, with its current complex. */
export function collectComplexes(env: Environment, state: State): Record<string, ComplexJSON> {
	const out: Record<string, ComplexJSON> = {};
	for (const [name, dval] of env) {
		if (dval.kind === "loc") out[name] = serializeComplex(access(state, dval));
	}
	return out;
}

//==============================================================================
// Graph export
//==============================================================================

export interface ComplexGraph {
	/** One node per identification class, named by its representative. */
	nodes: { id: VertexName; members: VertexName[] }[];
	edges: [VertexName, VertexName][];
	triangles: [VertexName, VertexName, VertexName][];
}

/**
 * 1- and 2-faces over canonical vertices, for drawing. Higher faces are
 * reduced to their triangles.
 */
export function complexGraph(c: Complex): ComplexGraph {
	const edges = new Map<string, [VertexName, VertexName]>();
	const triangles = new Map<string, [VertexName, VertexName, VertexName]>();

	for (const s of c.maximalSimplices) {
		const canon = [...new Set(s.map((v) => c.uf.find(v)))];
		for (const face of faces(canon)) {
			const [a, b, d] = [...face].sort();
			if (a === undefined || b === undefined) continue;
			if (face.length === 2) edges.set(simplexKey(face), [a, b]);
			if (face.length === 3 && d !== undefined) triangles.set(simplexKey(face), [a, b, d]);
		}
	}

	const nodes = c.vertices.map((v) => c.uf.find(v));
	const classes = c.classes;
	return {
		nodes: [...new Set(nodes)].map((id) => ({ id, members: [...(classes.get(id) ?? [id])] })),
		edges: [...edges.values()],
		triangles: [...triangles.values()],
	};
}
