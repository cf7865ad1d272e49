/**
 * Classification verdict for a source document
 */
export const VerdictEnum = {
    ELIGIBLE: 'ELIGIBLE',
    FAILED_MULTI_PAGE: 'FAILED_MULTI_PAGE',
    FAILED_NO_EXTRACTABLE_TEXT: 'FAILED_NO_EXTRACTABLE_TEXT',
} as const;

export type VerdictEnumType = (typeof VerdictEnum)[keyof typeof VerdictEnum];

export type FailedVerdictType = Exclude<VerdictEnumType, typeof VerdictEnum.ELIGIBLE>;

/**
 * Preserved field kinds
 */
export const FieldKindEnum = {
    GENDER: 'gender',
    AGE: 'age',
} as const;

export type FieldKindEnumType = (typeof FieldKindEnum)[keyof typeof FieldKindEnum];

/**
 * Per-document pipeline stage
 */
export const DocumentStageEnum = {
    START: 'START',
    CLASSIFIED: 'CLASSIFIED',
    FIELDS_EXTRACTED: 'FIELDS_EXTRACTED',
    REDACTED: 'REDACTED',
    FIELDS_REAPPLIED: 'FIELDS_REAPPLIED',
    METADATA_SCRUBBED: 'METADATA_SCRUBBED',
    DONE: 'DONE',
    REJECTED: 'REJECTED',
} as const;

export type DocumentStageEnumType = (typeof DocumentStageEnum)[keyof typeof DocumentStageEnum];

/**
 * Outcome status of a single document run
 */
export const OutcomeStatusEnum = {
    CENSORED: 'censored',
    REJECTED: 'rejected',
    ERROR: 'error',
} as const;

export type OutcomeStatusEnumType = (typeof OutcomeStatusEnum)[keyof typeof OutcomeStatusEnum];
