/**
 * Score Extractor
 *
 * Turns a free-text QA report into a MetricsRecord. Recognised markers for
 * the overall score, tried in order:
 *
 * 1. Tag:            `<overall_score: 7>` or `<overall_score: 35/50>`
 * 2. JSON object:    `{ "overall_score": 7 }` (fenced or bare, `overallScore` too)
 * 3. Labelled line:  `Overall Score: 7/10` (markdown bold and bullets allowed)
 *
 * The first marker found decides. A `/D` denominator rescales to 0-10; a
 * value outside [0, 10] is a ParseFailure, never clamped.
 */

import type { ExtractResult, MetricsRecord, SubScoreKey, SubScores } from '../types/index.js';
import { SUB_SCORE_KEYS } from '../types/index.js';

const NUMBER = String.raw`(-?\d+(?:\.\d+)?)`;
const FRACTION = String.raw`${NUMBER}(?:\s*\/\s*${NUMBER})?`;

type Normalized = { ok: true; value: number } | { ok: false; reason: string };

interface RawScore {
  numerator: number;
  denominator?: number | undefined;
  source: 'tag' | 'json' | 'label';
}

type JsonObject = Record<string, unknown>;

interface SubScoreNames {
  snake: string;
  camel: string;
  label: string;
}

const SUB_SCORE_NAMES: Record<SubScoreKey, SubScoreNames> = {
  consistency: { snake: 'consistency_score', camel: 'consistencyScore', label: 'consistency' },
  completeness: { snake: 'completeness_score', camel: 'completenessScore', label: 'completeness' },
  quality: { snake: 'quality_score', camel: 'qualityScore', label: 'quality' },
  scopeAdherence: { snake: 'scope_adherence_score', camel: 'scopeAdherenceScore', label: String.raw`scope[\s_]+adherence` },
};

type ListName = 'gaps' | 'recommendations' | 'scopeViolations';

interface ListSource {
  tag: string;
  jsonKeys: string[];
  headings: string[];
}

const LIST_SOURCES: Record<ListName, ListSource> = {
  gaps: {
    tag: 'gaps',
    jsonKeys: ['gaps', 'gap_analysis', 'gapAnalysis'],
    headings: ['identified gaps', 'gap analysis', 'gaps'],
  },
  recommendations: {
    tag: 'recommendations',
    jsonKeys: ['recommendations'],
    headings: ['recommendations for improvement', 'recommendations'],
  },
  scopeViolations: {
    tag: 'scope_violations',
    jsonKeys: ['scope_violations', 'scopeViolations'],
    headings: ['scope violations'],
  },
};

const NONE_ENTRY = /^(?:none|n\/a|nothing|no (?:gaps|recommendations|scope violations|violations|issues))(?: (?:identified|found|provided))?\.?$/i;
const LIST_MARKER = /^(?:[-*•+]|\d+[.)])\s+/;
const MARKDOWN_HEADING = /^\s{0,3}#{1,6}\s/;
const BOLD_LINE = /^\s*\*\*[^*]+\*\*\s*:?\s*$/;
const LABELLED_SCORE_LINE = /^[\s>*\-•]*\**\s*[a-z ]*score\**\s*:/i;
const TAG_LINE = /^\s*<\/?[a-z_]+(?:\s*:[^>]*)?>/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizeScore(raw: RawScore): Normalized {
  const { numerator, denominator } = raw;
  if (denominator !== undefined) {
    if (denominator <= 0) {
      return { ok: false, reason: `Score denominator must be positive, got ${denominator}` };
    }
    const value = (numerator * 10) / denominator;
    if (value < 0 || value > 10) {
      return { ok: false, reason: `Score ${numerator}/${denominator} is outside the 0-10 scale` };
    }
    return { ok: true, value };
  }
  if (numerator < 0 || numerator > 10) {
    return { ok: false, reason: `Score ${numerator} is outside the 0-10 scale` };
  }
  return { ok: true, value: numerator };
}

function toRawScore(match: RegExpMatchArray, source: RawScore['source']): RawScore | undefined {
  const numerator = match[1];
  if (numerator === undefined) return undefined;
  const denominator = match[2];
  return {
    numerator: parseFloat(numerator),
    denominator: denominator === undefined ? undefined : parseFloat(denominator),
    source,
  };
}

function findTagScore(text: string, tagName: string): RawScore | undefined {
  const pattern = new RegExp(String.raw`<\s*${tagName}\s*:\s*${FRACTION}\s*>`, 'i');
  const match = text.match(pattern);
  return match ? toRawScore(match, 'tag') : undefined;
}

function findLabelledScore(text: string, labelPattern: string): RawScore | undefined {
  const pattern = new RegExp(
    String.raw`^[ \t>]*(?:[-*•+][ \t]+)?\**[ \t]*${labelPattern}[ \t]+score[ \t]*\**[ \t]*:[ \t]*\**[ \t]*${FRACTION}`,
    'im'
  );
  const match = text.match(pattern);
  return match ? toRawScore(match, 'label') : undefined;
}

function findJsonScore(json: JsonObject | undefined, keys: string[]): RawScore | undefined {
  if (!json) return undefined;
  for (const key of keys) {
    const value = json[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return { numerator: value, source: 'json' };
    }
  }
  return undefined;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Drops `// comment` tails, which models often copy from an example schema
 */
function stripLineComments(text: string): string {
  return text.replace(/(^|[,{[\s])\/\/[^\n]*$/gm, '$1');
}

function tryParseObject(candidate: string): JsonObject | undefined {
  for (const attempt of [candidate, stripLineComments(candidate)]) {
    try {
      const parsed: unknown = JSON.parse(attempt);
      if (isJsonObject(parsed)) return parsed;
    } catch {
      // not JSON in this form; try the next one
      continue;
    }
  }
  return undefined;
}

/**
 * Finds a JSON object in the report: a ```json fence first, then the span
 * from the first `{` to the last `}`.
 */
export function findJsonObject(text: string): JsonObject | undefined {
  const fenced = text.match(/```(?:json)?\s*\n([\s\S]*?)```/i);
  if (fenced?.[1]) {
    const parsed = tryParseObject(fenced[1].trim());
    if (parsed) return parsed;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return tryParseObject(text.slice(start, end + 1));
  }
  return undefined;
}

function cleanEntries(lines: string[]): string[] {
  const entries: string[] = [];
  for (const line of lines) {
    const entry = line.trim().replace(LIST_MARKER, '').trim();
    if (entry && !NONE_ENTRY.test(entry)) {
      entries.push(entry);
    }
  }
  return entries;
}

function fromTagBlock(text: string, tag: string): string[] | undefined {
  const pattern = new RegExp(String.raw`<${tag}>([\s\S]*?)<\/${tag}>`, 'i');
  const match = text.match(pattern);
  if (match?.[1] === undefined) return undefined;
  return cleanEntries(match[1].split('\n'));
}

function fromJson(json: JsonObject | undefined, keys: string[]): string[] | undefined {
  if (!json) return undefined;
  for (const key of keys) {
    const value = json[key];
    if (Array.isArray(value)) {
      return cleanEntries(value.filter((item): item is string => typeof item === 'string'));
    }
    if (typeof value === 'string') {
      return cleanEntries(value.split('\n'));
    }
  }
  return undefined;
}

function headingPattern(headings: string[]): RegExp {
  const names = headings.map(escapeRegExp).join('|');
  // "## Gaps", "**Gaps:**", "Gaps:", "- **Gaps:** inline entry"; the name must
  // end the line or take a colon, so "- Gaps between steps: ..." is an entry
  return new RegExp(
    String.raw`^\s*(?:#{1,6}\s*|[-*•+]\s+)?\**\s*(?:${names})\s*\**\s*(?::|$)\s*\**\s*(.*)$`,
    'i'
  );
}

function isKnownHeading(line: string): boolean {
  return Object.values(LIST_SOURCES).some((source) => headingPattern(source.headings).test(line));
}

function isSectionBoundary(line: string): boolean {
  return MARKDOWN_HEADING.test(line)
    || BOLD_LINE.test(line)
    || LABELLED_SCORE_LINE.test(line)
    || TAG_LINE.test(line)
    || isKnownHeading(line);
}

function fromHeadedSection(text: string, headings: string[]): string[] | undefined {
  const lines = text.split('\n');
  const pattern = headingPattern(headings);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const match = line.match(pattern);
    if (!match) continue;

    // A bare mention like "Gaps in the flow are..." is prose, not a heading
    const inline = (match[1] ?? '').trim();
    const looksLikeHeading = MARKDOWN_HEADING.test(line) || line.includes(':') || BOLD_LINE.test(line);
    if (!looksLikeHeading) continue;

    const body: string[] = inline ? [inline] : [];
    for (let j = i + 1; j < lines.length; j++) {
      const next = lines[j] ?? '';
      if (isSectionBoundary(next)) break;
      body.push(next);
    }
    return cleanEntries(body);
  }
  return undefined;
}

function extractList(text: string, json: JsonObject | undefined, name: ListName): string[] {
  const source = LIST_SOURCES[name];
  return fromTagBlock(text, source.tag)
    ?? fromJson(json, source.jsonKeys)
    ?? fromHeadedSection(text, source.headings)
    ?? [];
}

function extractSubScores(text: string, json: JsonObject | undefined): SubScores {
  const subScores: SubScores = {};
  for (const key of SUB_SCORE_KEYS) {
    const names = SUB_SCORE_NAMES[key];
    const raw = findTagScore(text, names.snake)
      ?? findJsonScore(json, [names.snake, names.camel])
      ?? findLabelledScore(text, names.label);
    if (!raw) continue;
    const normalized = normalizeScore(raw);
    if (normalized.ok) {
      subScores[key] = normalized.value;
    }
  }
  return subScores;
}

/**
 * Extract a MetricsRecord from a QA report. Pure.
 */
export function extract(rawReportText: string): ExtractResult {
  const json = findJsonObject(rawReportText);

  const raw = findTagScore(rawReportText, 'overall_score')
    ?? findJsonScore(json, ['overall_score', 'overallScore'])
    ?? findLabelledScore(rawReportText, 'overall');

  if (!raw) {
    return {
      ok: false,
      failure: { reason: 'No overall score marker found in report', rawText: rawReportText },
    };
  }

  const normalized = normalizeScore(raw);
  if (!normalized.ok) {
    return { ok: false, failure: { reason: normalized.reason, rawText: rawReportText } };
  }

  const metrics: MetricsRecord = {
    overallScore: normalized.value,
    subScores: extractSubScores(rawReportText, json),
    gaps: extractList(rawReportText, json, 'gaps'),
    recommendations: extractList(rawReportText, json, 'recommendations'),
    scopeViolations: extractList(rawReportText, json, 'scopeViolations'),
    rawText: rawReportText,
  };

  return { ok: true, metrics };
}

/**
 * Reads the `<errors: N>` tag a requirements-document audit ends with.
 * Returns null when the tag is missing.
 */
export function extractErrorCount(report: string): number | null {
  const match = report.match(/<\s*errors\s*:\s*(\d+)\s*>/i);
  if (match?.[1] === undefined) return null;
  return parseInt(match[1], 10);
}
