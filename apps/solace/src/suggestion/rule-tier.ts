/**
 * RuleBasedTier - offline, deterministic last tier of the fallback chain
 *
 * Picks a template by emotion, then by the first variant whose keywords
 * appear in the message, and fills in a short excerpt of what the user wrote.
 */

import templateData from '../data/fallback-templates.json';
import { CANONICAL_EMOTIONS, CanonicalEmotion, EmotionLabel } from '../emotion/types';
import { PhraseMatcher } from '../utils/phrases';
import { SourceTiers, SuggestionRequest, SuggestionTier, TierOutcome } from './types';

export interface TemplateVariant {
  id: string;
  keywords: readonly string[];
  text: string;
}

export interface EmotionTemplates {
  default: string;
  variants: readonly TemplateVariant[];
}

export interface TemplateCatalog {
  generic: string;
  emotions: Readonly<Record<CanonicalEmotion, EmotionTemplates>>;
}

export const DEFAULT_TEMPLATES: TemplateCatalog = templateData;

export const EXCERPT_PLACEHOLDER = '{{excerpt}}';
export const EXCERPT_MAX_LENGTH = 60;

/**
 * Stand-in when there is no text to quote
 */
export const PARAPHRASE = "what you're going through";

export interface TemplateChoice {
  emotion: EmotionLabel;
  templateId: string;
  template: string;
}

const isCanonical = (label: string): label is CanonicalEmotion => {
  return CANONICAL_EMOTIONS.some((canonical) => canonical === label);
};

/**
 * Quoted, whitespace-collapsed excerpt of the user's words, cut on a word
 * boundary; the paraphrase when there is nothing to quote.
 */
export function excerptOf(text: string, maxLength: number = EXCERPT_MAX_LENGTH): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (!collapsed) return PARAPHRASE;
  if (collapsed.length <= maxLength) return `"${collapsed}"`;

  const cut = collapsed.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  const head = lastSpace > maxLength / 2 ? cut.slice(0, lastSpace) : cut;
  return `"${head}..."`;
}

/**
 * Fill every placeholder, capitalizing the replacement where it opens a sentence
 */
export function renderTemplate(template: string, excerpt: string): string {
  return template.split(EXCERPT_PLACEHOLDER).reduce((rendered, part, index) => {
    if (index === 0) return part;
    const opensSentence = rendered.length === 0 || /[.!?]\s+$/.test(rendered);
    const value = opensSentence ? excerpt.charAt(0).toUpperCase() + excerpt.slice(1) : excerpt;
    return rendered + value + part;
  }, '');
}

/**
 * Template for an emotion and message; generic for neutral or unknown labels
 */
export function selectTemplate(
  emotion: EmotionLabel,
  text: string,
  catalog: TemplateCatalog = DEFAULT_TEMPLATES
): TemplateChoice {
  if (!isCanonical(emotion)) {
    return { emotion, templateId: 'generic', template: catalog.generic };
  }

  const templates = catalog.emotions[emotion];
  const variant = templates.variants.find((candidate) => new PhraseMatcher(candidate.keywords).test(text));

  if (variant) {
    return { emotion, templateId: `${emotion}.${variant.id}`, template: variant.text };
  }
  return { emotion, templateId: `${emotion}.default`, template: templates.default };
}

/**
 * Reply for an emotion and message, without any I/O
 */
export function composeRuleReply(
  emotion: EmotionLabel,
  text: string,
  catalog: TemplateCatalog = DEFAULT_TEMPLATES
): string {
  const choice = selectTemplate(emotion, text, catalog);
  return renderTemplate(choice.template, excerptOf(text));
}

export class RuleBasedTier implements SuggestionTier {
  readonly tier = SourceTiers.FALLBACK_RULE;

  constructor(private readonly catalog: TemplateCatalog = DEFAULT_TEMPLATES) {}

  isAvailable(): boolean {
    return true;
  }

  async attempt(request: SuggestionRequest): Promise<TierOutcome> {
    return { ok: true, text: composeRuleReply(request.emotion.primaryLabel, request.text, this.catalog) };
  }
}
