/**
 * Model-based tests: random add / remove / balance sequences are replayed on
 * an OrderedTree and on a persistent red-black tree, and the two must agree
 * after every step.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import createTree from 'functional-red-black-tree';

import { OrderedTree } from '../src/index';

// ============================================================================
// CONFIGURATION & UTILITIES
// ============================================================================

const SEEDS = [1337, 42, 2024];
const STEPS = 1500;
const KEY_SPACE = 120;

/**
 * Deterministic pseudo-random number generator (Mulberry32).
 * @returns A function returning a number in [0, 1).
 */
function createRNG(seed: number) {
    return function() {
        let t = seed += 0x6D2B79F5;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Re-inserting a search tree's pre-order sequence into an empty tree
 * reproduces the same shape, and only does so if the order invariant holds.
 */
function assertShapeInvariant(tree: OrderedTree<number>, label: string) {
    const pre = tree.toArrayPreorder();
    assert.deepEqual(new OrderedTree<number>(pre).toArrayPreorder(), pre, label);
}

function assertStrictlyAscending(values: number[], label: string) {
    for (let i = 1; i < values.length; i++) {
        assert.ok(values[i - 1] < values[i], `${label}: ${values[i - 1]} before ${values[i]}`);
    }
}

// ============================================================================
// MODEL RUNS
// ============================================================================

describe('OrderedTree against a reference ordered set', () => {
    for (const seed of SEEDS) {
        it(`agrees for seed ${seed}`, () => {
            const random = createRNG(seed);
            const tree = new OrderedTree<number>();
            let model = createTree<number, boolean>((a, b) => a - b);

            for (let step = 0; step < STEPS; step++) {
                const key = Math.floor(random() * KEY_SPACE);
                const roll = random();
                const label = `seed ${seed}, step ${step}`;

                if (roll < 0.55) {
                    const expected = model.get(key) === undefined;
                    assert.equal(tree.add(key), expected, `${label}: add(${key})`);
                    if (expected) model = model.insert(key, true);
                } else if (roll < 0.97) {
                    const expected = model.get(key) !== undefined;
                    const before = expected ? [] : tree.toArrayPreorder();
                    assert.equal(tree.remove(key), expected, `${label}: remove(${key})`);
                    if (expected) model = model.remove(key);
                    else assert.deepEqual(tree.toArrayPreorder(), before, `${label}: miss changed the tree`);
                } else {
                    tree.balance();
                    assert.equal(tree.height(), 32 - Math.clz32(tree.size), `${label}: balance height`);
                }

                const inorder = tree.toArrayInorder();
                assert.equal(tree.size, model.length, `${label}: size`);
                assert.equal(inorder.length, tree.size, `${label}: size vs traversal`);
                assert.deepEqual(inorder, model.keys, `${label}: contents`);
                assert.equal(tree.contains(key), model.get(key) !== undefined, `${label}: contains(${key})`);
                assertStrictlyAscending(inorder, label);
            }

            assertShapeInvariant(tree, `seed ${seed}`);
            assert.equal(tree.getMin(), model.begin.key);
            assert.equal(tree.getMax(), model.end.key);
        });
    }

    it('keeps the order invariant through interleaved removals and rebalances', () => {
        const random = createRNG(7);
        const tree = new OrderedTree<number>();
        for (let i = 0; i < 400; i++) tree.add(Math.floor(random() * 1000));

        for (let round = 0; round < 20; round++) {
            for (const v of tree.toArrayBreadthFirst().slice(0, 5)) tree.remove(v);
            assertShapeInvariant(tree, `round ${round}`);
            if (round % 4 === 3) tree.balance();
        }
        assertStrictlyAscending(tree.toArrayInorder(), 'final');
    });
});
