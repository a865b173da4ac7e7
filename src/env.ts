// SCDL Environment and State
// Copy-on-extend environments and the explicitly threaded evaluation state

import type { Complex, VertexName } from "./complex.ts";
import { SCDLError } from "./errors.ts";
import { type DVal, type LocVal, locVal } from "./types.ts";

//==============================================================================
// Environment (ρ)
// Maps identifiers to denotable values
//==============================================================================

export type Environment = ReadonlyMap<string, DVal>;

/**
 * Extend an environment with a new binding.
 * Returns a new Map without modifying the original.
 */
export function extendEnvironment(
	env: Environment,
	name: string,
	value: DVal,
): Environment {
	const newEnv = new Map(env);
	newEnv.set(name, value);
	return newEnv;
}

/**
 * Extend an environment with multiple bindings.
 */
export function extendEnvironmentMany(
	env: Environment,
	bindings: readonly (readonly [string, DVal])[],
): Environment {
	const newEnv = new Map(env);
	for (const [name, value] of bindings) {
		newEnv.set(name, value);
	}
	return newEnv;
}

export function lookup(env: Environment, name: string): DVal {
	const value = env.get(name);
	if (value === undefined) throw SCDLError.unboundIdentifier(name);
	return value;
}

export function emptyEnvironment(): Environment {
	return new Map();
}

//==============================================================================
// State (σ)
// Store, allocation pointer, global vertex order and fresh-name counter
//==============================================================================

export interface State {
	readonly store: ReadonlyMap<number, Complex>;
	readonly nextLoc: number;
	readonly vertexOrder: ReadonlyMap<VertexName, number>;
	readonly freshVertexId: number;
}

export function emptyState(): State {
	return {
		store: new Map(),
		nextLoc: 0,
		vertexOrder: new Map(),
		freshVertexId: 0,
	};
}

export function allocate(state: State, value: Complex): [LocVal, State] {
	const loc = locVal(state.nextLoc);
	const store = new Map(state.store);
	store.set(loc.addr, value);
	return [loc, { ...state, store, nextLoc: state.nextLoc + 1 }];
}

/** Overwrite an allocated address; aliases of the address observe the change. */
export function update(state: State, addr: number, value: Complex): State {
	if (!state.store.has(addr)) throw SCDLError.uninitializedAddress(addr);
	const store = new Map(state.store);
	store.set(addr, value);
	return { ...state, store };
}

export function access(state: State, loc: LocVal): Complex {
	const value = state.store.get(loc.addr);
	if (value === undefined) throw SCDLError.uninitializedAddress(loc.addr);
	return value;
}

/** Append unseen vertices to the global declaration order. */
export function ensureVertexOrder(state: State, vertices: Iterable<VertexName>): State {
	let order: Map<VertexName, number> | undefined;
	for (const v of vertices) {
		if (state.vertexOrder.has(v) || order?.has(v)) continue;
		order ??= new Map(state.vertexOrder);
		order.set(v, order.size);
	}
	return order ? { ...state, vertexOrder: order } : state;
}

/** Next `__v<n>` name not already in the vertex order, registered in it. */
export function freshVertex(state: State): [VertexName, State] {
	let id = state.freshVertexId;
	let candidate = "__v" + String(id);
	while (state.vertexOrder.has(candidate)) {
		id++;
		candidate = "__v" + String(id);
	}
	const next = ensureVertexOrder({ ...state, freshVertexId: id + 1 }, [candidate]);
	return [candidate, next];
}

//==============================================================================
// Block scoping
//==============================================================================

export function highWaterMark(state: State): number {
	return state.nextLoc;
}

/**
 * Discard addresses allocated at or above `mark`. Mutations of older
 * addresses and vertex-order updates are kept.
 */
export function rollback(state: State, mark: number): State {
	if (state.nextLoc <= mark) return { ...state, nextLoc: mark };
	const store = new Map(state.store);
	for (const addr of state.store.keys()) {
		if (addr >= mark) store.delete(addr);
	}
	return { ...state, store, nextLoc: mark };
}
