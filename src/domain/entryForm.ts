/**
 * Entry form state as plain values. Each change returns a new draft.
 */
import { defaultCategory, TX_TYPES } from './categories';
import type { TransactionInput, TxType } from './types';

export interface EntryDraft {
  date: string;          // YYYY-MM-DD
  type: TxType;
  category: string;
  description: string;
  amount: number;
}

export function initialDraft(today: string): EntryDraft {
  return {
    date: today,
    type: TX_TYPES.INCOME,
    category: defaultCategory(TX_TYPES.INCOME),
    description: '',
    amount: 0,
  };
}

/** Switching type always resets the category to the new type's default */
export function changeType(draft: EntryDraft, type: TxType): EntryDraft {
  return { ...draft, type, category: defaultCategory(type) };
}

export function canSubmit(draft: EntryDraft): boolean {
  return draft.description.trim() !== '' && Number.isFinite(draft.amount) && draft.amount > 0;
}

export function toTransactionInput(draft: EntryDraft): TransactionInput {
  return {
    date: draft.date,
    type: draft.type,
    category: draft.category,
    description: draft.description.trim(),
    amount: draft.amount,
  };
}

/** Clear the per-entry fields, keep date/type/category for the next entry */
export function resetAfterSubmit(draft: EntryDraft): EntryDraft {
  return { ...draft, description: '', amount: 0 };
}

export interface EntryFormState {
  draft: EntryDraft;
  success: boolean;     // shown once, until the next edit or submit
}

export type EntryFormAction =
  | { kind: 'edit'; patch: Partial<Pick<EntryDraft, 'date' | 'category' | 'description' | 'amount'>> }
  | { kind: 'changeType'; type: TxType }
  | { kind: 'submitStarted' }
  | { kind: 'saved' };

export function initialFormState(today: string): EntryFormState {
  return { draft: initialDraft(today), success: false };
}

/**
 * Form transitions. `saved` resets the draft as it is when the save
 * completes, so edits made while the request was in flight are kept.
 */
export function entryFormReducer(state: EntryFormState, action: EntryFormAction): EntryFormState {
  switch (action.kind) {
    case 'edit':
      return { draft: { ...state.draft, ...action.patch }, success: false };
    case 'changeType':
      return { draft: changeType(state.draft, action.type), success: false };
    case 'submitStarted':
      return { ...state, success: false };
    case 'saved':
      return { draft: resetAfterSubmit(state.draft), success: true };
  }
}
