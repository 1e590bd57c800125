/**
 * Shared test fixtures
 */
import path from 'path';
import type { LocaleTree } from '../src/types/index.js';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures', 'locales');

export function fixturePath(name: string): string {
    return path.join(FIXTURES_DIR, name);
}

/** Logger whose calls can be asserted and which prints nothing */
export function silentLogger() {
    return {
        warn: jest.fn<void, [string, ...unknown[]]>(),
        debug: jest.fn<void, [string, ...unknown[]]>(),
    };
}

// === Common locale trees ===
export const EN: LocaleTree = {
    greeting: 'Hello [name]',
    cart: {
        items: {
            '[count] == 0': 'Your cart is empty',
            '[count] == 1': 'One item in your cart',
            '[count] > 1': '[count] items in your cart',
        },
    },
    age: {
        '[age] >= 18': {
            '[member] == true': 'Welcome back, member',
            default: 'Welcome, adult',
        },
        default: 'Ask a parent',
    },
};

export const FR: LocaleTree = {
    greeting: 'Bonjour [name]',
    cart: {
        items: {
            '[count] == 0': 'Votre panier est vide',
            '[count] == 1': 'Un article dans votre panier',
            '[count] > 1': '[count] articles dans votre panier',
        },
    },
};
