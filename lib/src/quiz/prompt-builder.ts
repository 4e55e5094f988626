/**
 * Quiz Prompt Builder
 *
 * Renders the system and user messages for MCQ generation. Pure: the same
 * inputs always give the same messages.
 */

import { type LLMMessage, createSystemMessage, createUserMessage } from '../llm/index.js';
import { type QuizLanguage } from './types.js';

// =============================================================================
// Templates
// =============================================================================

export const LANGUAGE_INSTRUCTIONS: Readonly<Record<QuizLanguage, string>> = {
  en: 'All questions, choices, and explanations must be in clear English.',
  he: 'השאלות, אפשרויות הבחירה וההסברים חייבים להיות בעברית תקינה. שמור על RTL וסימני פיסוק.',
};

const SYSTEM_PROMPT_TEMPLATES: Readonly<Record<QuizLanguage, string>> = {
  en: `You generate multiple-choice questions from provided text.
{languageInstructions}
Return EXACTLY {numQuestions} questions unless the content cannot support that many; never exceed {numQuestions}.`,
  he: `אתה יוצר שאלות רב-ברירה מתוך הטקסט שסופק.
{languageInstructions}
החזר בדיוק {numQuestions} שאלות, אלא אם התוכן אינו מספיק לכך; לעולם אל תחרוג מ-{numQuestions}.`,
};

export const DEFAULT_USER_PROMPT_TEMPLATE = `You are generating professional monthly mission **{subject} multiple-choice questions (MCQs)** from input text.
Audience: {audience}. Content must be accurate, unambiguous, and operationally useful.
Try to refer any single key takeaway from the text.

{languageInstructions}

Return **ONLY** a single JSON object that **exactly** matches this schema (no markdown, no code fences, no extra keys):

{
  "source_summary": "string, ≤ 400 chars concise summary of the key takeaways the questions are based on",
  "questions": [
    {
      "id": "string, unique like Q1, Q2 ...",
      "topic": "string, short (e.g., 'Air Evacuation', 'Vascular Access', 'Heat Injury', 'Airway/Neck Trauma')",
      "difficulty": "string, one of ['basic','intermediate','advanced']",
      "stem": "string, the question stem in one paragraph, ≤ 320 chars, no line breaks",
      "options": [
        {"label":"A","text":"string, plausible distractor or correct answer"},
        {"label":"B","text":"string"},
        {"label":"C","text":"string"},
        {"label":"D","text":"string"}
      ],
      "answer": {"label": "one of ['A','B','C','D']", "text": "string that exactly matches the chosen option text"},
      "rationale": "string, ≤ 300 chars, why the correct answer is correct and why others are not appropriate in this context",
      "operational_note": "string, ≤ 200 chars, practical field note (if applicable), else empty string",
      "safety_flags": ["array of short strings for safety-critical cues present in the question, can be empty"]
    }
  ]
}

Hard constraints:
- Produce **exactly {numQuestions}** questions in "questions".
- Use **clear, field-proven guidance** from the text; **do not invent** protocols.
- No references/citations or page numbers in the JSON.
- **Do not** include any text before or after the JSON.
- **Do not** include code fences, markdown, or comments.

Content guardrails:
- Prefer single-best-answer MCQs.
- Options must be mutually exclusive and collectively plausible.
- Avoid ambiguous wording, double negatives, or local jargon without context.
- Avoid exposing the answer in the question or the options.
- Do not include sensitive PII.

Here is the source text to base your questions on:
---
{documentText}
---
`;

// =============================================================================
// Builder
// =============================================================================

export interface QuizPromptOptions {
  /** Who the questions are written for */
  audience?: string | undefined;
  /** Subject area named in the instructions */
  subject?: string | undefined;
}

export interface BuiltQuizPrompt {
  system: string;
  user: string;
  messages: LLMMessage[];
}

export const DEFAULT_AUDIENCE = 'trained medics';
export const DEFAULT_SUBJECT = 'medical';

function fill(template: string, values: Readonly<Record<string, string>>): string {
  // Replacer functions keep `$` sequences in the document text literal
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function buildSystemPrompt(numQuestions: number, language: QuizLanguage): string {
  return fill(SYSTEM_PROMPT_TEMPLATES[language], {
    languageInstructions: LANGUAGE_INSTRUCTIONS[language],
    numQuestions: String(numQuestions),
  });
}

export function buildUserPrompt(
  documentText: string,
  numQuestions: number,
  language: QuizLanguage,
  options: QuizPromptOptions = {}
): string {
  // Placeholders are filled in one pass, so braces inside the document survive
  return fill(DEFAULT_USER_PROMPT_TEMPLATE, {
    subject: options.subject ?? DEFAULT_SUBJECT,
    audience: options.audience ?? DEFAULT_AUDIENCE,
    languageInstructions: LANGUAGE_INSTRUCTIONS[language],
    numQuestions: String(numQuestions),
    documentText,
  });
}

/**
 * Builds the system and user messages for one generation request.
 *
 * @example
 * ```typescript
 * const { messages } = buildQuizPrompt(text, 6, 'he');
 * const completion = await client.complete({ model: 'gpt-4.1', messages });
 * ```
 */
export function buildQuizPrompt(
  documentText: string,
  numQuestions: number,
  language: QuizLanguage,
  options: QuizPromptOptions = {}
): BuiltQuizPrompt {
  const system = buildSystemPrompt(numQuestions, language);
  const user = buildUserPrompt(documentText, numQuestions, language, options);

  return {
    system,
    user,
    messages: [createSystemMessage(system), createUserMessage(user)],
  };
}
