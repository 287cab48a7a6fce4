// Local types for change detection module

export type ChangeKind = 'increased' | 'decreased' | 'text_diff' | 'status_change';

export interface ChangeDetectionResult {
  changed: boolean;
  changeKind: ChangeKind | null;
  diffSummary: string | null;
  percentChange?: number; // for price changes
  diffDetails?: {         // for text changes - detailed diff info
    addedWords: number;
    removedWords: number;
    addedParts: string[];
    removedParts: string[];
  };
}

export const NO_CHANGE: ChangeDetectionResult = Object.freeze({
  changed: false,
  changeKind: null,
  diffSummary: null,
});
