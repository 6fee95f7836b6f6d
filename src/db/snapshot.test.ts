import { describe, expect, it } from 'vitest';
import { decodeAppState, decodeSnapshot, encodeAppState, encodeSnapshot } from './snapshot';
import type { AppState } from '../domain/types';

describe('snapshot codec', () => {
  it('fills in missing collections with empty defaults', () => {
    expect(decodeAppState({})).toEqual({ bankAccounts: [], monthlyData: {} });
    expect(decodeAppState({ monthlyData: { '2025-01': {} } })).toEqual({
      bankAccounts: [],
      monthlyData: { '2025-01': { monthlySalary: 0, categories: [], expenses: [] } },
    });
  });

  it('maps a null icon to Default', () => {
    const decoded = decodeAppState({
      monthlyData: {
        '2025-01': { categories: [{ id: 1, name: 'Food', amount: 0, color: 1, icon: null }] },
      },
    });
    expect(decoded?.monthlyData['2025-01'].categories[0].icon).toBe('Default');
  });

  it('rejects documents with wrongly typed fields', () => {
    expect(decodeAppState({ bankAccounts: [{ id: 'x', name: 'A', initialBalance: 1 }] })).toBeNull();
    expect(decodeAppState(null)).toBeNull();
    expect(decodeSnapshot('')).toBeNull();
  });

  it('copies state so later changes do not leak into an encoded document', () => {
    const state: AppState = { bankAccounts: [{ id: 1, name: 'A', initialBalance: 10 }], monthlyData: {} };
    const encoded = encodeAppState(state);
    state.bankAccounts[0].name = 'B';
    expect(encoded.bankAccounts[0].name).toBe('A');
    expect(decodeSnapshot(encodeSnapshot(state))).toEqual(state);
  });
});
