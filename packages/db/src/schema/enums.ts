import { pgEnum } from "drizzle-orm/pg-core";

/**
 * Enum registry for the reader study.
 *
 * Add values only once the API and the scoring code understand them.
 */

/**
 * Assessment phase.
 * - `PRE`: before the AI predictions are revealed.
 * - `POST`: after the AI predictions are revealed.
 */
export const assessmentPhaseEnum = pgEnum("assessment_phase", ["PRE", "POST"]);

export const ASSESSMENT_PHASES = assessmentPhaseEnum.enumValues;
export type AssessmentPhase = (typeof ASSESSMENT_PHASES)[number];

/** Investigation the reader would order next. */
export const investigationActionEnum = pgEnum("investigation_action", [
  "NONE",
  "BIOPSY",
  "DERMOSCOPY",
  "OTHER",
]);

/** Follow-up the reader would recommend. */
export const nextStepActionEnum = pgEnum("next_step_action", [
  "REASSURE",
  "FOLLOW_UP",
  "TREAT",
  "REFER",
]);

export const INVESTIGATION_ACTIONS = investigationActionEnum.enumValues;
export const NEXT_STEP_ACTIONS = nextStepActionEnum.enumValues;
