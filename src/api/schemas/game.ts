// ═══════════════════════════════════════════════════════════════════════════════
// GAME SCHEMAS — Modes, Questions and Answers
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import {
  LIST_DEFAULTS,
  LimitSchema,
  ModeFilterSchema,
  NullableStringSchema,
  TagsSchema,
} from './common.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MODE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A game mode card deck. Collection: `mode`.
 */
export const ModeSchema = z.object({
  key: z.string({ required_error: 'key is required' }),
  title: z.string({ required_error: 'title is required' }),
  description: z.string({ required_error: 'description is required' }),
  color: z.string({ required_error: 'color is required' }),
});

export type Mode = z.infer<typeof ModeSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// QUESTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A creative prompt. Collection: `question`.
 *
 * `mode` is a plain string here; membership in MODE_KEYS is checked by the
 * create handler so that it can answer 400 rather than 422.
 */
export const QuestionSchema = z.object({
  mode: z.string({ required_error: 'mode is required' }),
  text: z.string({ required_error: 'text is required' }),
  tags: TagsSchema,
  locale: z.string().default('en-KE'),
});

export const CreateQuestionSchema = QuestionSchema;

export type Question = z.infer<typeof QuestionSchema>;
export type CreateQuestionRequest = z.input<typeof CreateQuestionSchema>;

export const ListQuestionsQuerySchema = z.object({
  mode: ModeFilterSchema,
  limit: LimitSchema.default(LIST_DEFAULTS.questions),
});

export type ListQuestionsQuery = z.infer<typeof ListQuestionsQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// ANSWER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A player's answer to a question. Collection: `answer`.
 */
export const AnswerSchema = z.object({
  mode: z.string({ required_error: 'mode is required' }),
  question_text: z.string({ required_error: 'question_text is required' }),
  answer_text: z.string({ required_error: 'answer_text is required' }),
  username: NullableStringSchema,
  points_awarded: z.number().int('points_awarded must be an integer').default(0),
});

export type Answer = z.infer<typeof AnswerSchema>;

export const ListAnswersQuerySchema = z.object({
  mode: ModeFilterSchema,
  limit: LimitSchema.default(LIST_DEFAULTS.answers),
});

export type ListAnswersQuery = z.infer<typeof ListAnswersQuerySchema>;
