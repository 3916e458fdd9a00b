// src/services/report/OutputParser.ts
import { z } from 'zod';
import { OutputFormat } from '../../types/analysis.types';
import {
  Conclusion,
  Priority,
  Recommendation,
  ReportContent,
  ReportSection,
  RiskAssessment,
  RiskFactor,
  RiskLevel
} from '../../types/report.types';
import { EmptyModelOutputError } from '../../utils/errors';
import { Logger, describeError } from '../../utils/logger';
import { extractCitations } from './CitationExtractor';

const logger = new Logger('OutputParser');

export const DEFAULT_REPORT_TITLE = 'Analysis Report';
export const FALLBACK_SECTION_TITLE = 'Full Analysis';
const SUMMARY_FALLBACK_CHARS = 500;

// ---------------------------------------------------------------------------
// Wire schema for structured (JSON) output
// ---------------------------------------------------------------------------

const WireTableSchema = z.object({
  title: z.string().optional(),
  headers: z.array(z.coerce.string()).default([]),
  rows: z.array(z.array(z.coerce.string())).default([])
});

const WireFigureSchema = z.object({
  caption: z.string(),
  url: z.string().optional()
});

const WireLeafSectionSchema = z.object({
  title: z.string(),
  content: z.string().default(''),
  tables: z.array(WireTableSchema).optional(),
  figures: z.array(WireFigureSchema).optional()
});

const WireSectionSchema = WireLeafSectionSchema.extend({
  sub_sections: z.array(WireLeafSectionSchema).optional()
});

const WireConclusionSchema = z.union([
  z.string(),
  z.object({
    statement: z.string(),
    confidence: z.number().optional(),
    supporting_evidence: z.array(z.string()).optional()
  })
]);

const WireRecommendationSchema = z.union([
  z.string(),
  z.object({
    action: z.string(),
    priority: z.string().optional(),
    rationale: z.string().optional(),
    timeline: z.string().optional()
  })
]);

const WireRiskFactorSchema = z.object({
  description: z.string(),
  likelihood: z.number(),
  impact: z.number(),
  mitigation: z.string().optional()
});

export const StructuredReportSchema = z.object({
  title: z.string().optional(),
  executive_summary: z.string().default(''),
  sections: z.array(WireSectionSchema).default([]),
  conclusions: z.array(WireConclusionSchema).default([]),
  recommendations: z.array(WireRecommendationSchema).default([]),
  risk_assessment: z
    .object({
      overall_level: z.string().optional(),
      overall_score: z.number().optional(),
      factors: z.array(WireRiskFactorSchema).default([])
    })
    .optional()
});

type WireLeafSection = z.infer<typeof WireLeafSectionSchema>;

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function computeRiskFactorScore(likelihood: number, impact: number): number {
  return clamp01(likelihood) * clamp01(impact);
}

export function classifyRiskLevel(score: number): RiskLevel {
  if (score >= 0.8) return 'Critical';
  if (score >= 0.6) return 'High';
  if (score >= 0.4) return 'Medium';
  if (score >= 0.2) return 'Low';
  return 'Negligible';
}

export function buildRiskAssessment(factors: RiskFactor[]): RiskAssessment {
  const overallScore = factors.length > 0 ? factors.reduce((sum, f) => sum + f.score, 0) / factors.length : 0;
  return { overallLevel: classifyRiskLevel(overallScore), overallScore, factors };
}

export function inferPriority(text: string): Priority {
  if (/\b(immediate(ly)?|urgent(ly)?|cease|critical|asap|without delay)\b|立即|紧急|停止/i.test(text)) {
    return 'High';
  }
  if (/\b(monitor|consider|optional(ly)?|long[- ]term|when convenient)\b|考虑|关注|监控/i.test(text)) {
    return 'Low';
  }
  return 'Medium';
}

export function normalizePriority(value: string | undefined, fallbackText: string): Priority {
  const normalized = (value ?? '').trim().toLowerCase();
  if (/^(high|critical|urgent)|^高/.test(normalized)) return 'High';
  if (/^(medium|moderate|normal)|^中/.test(normalized)) return 'Medium';
  if (/^low|^低/.test(normalized)) return 'Low';
  return inferPriority(fallbackText);
}

function stripEmphasis(text: string): string {
  return text.replace(/\*\*|__/g, '').trim();
}

/** First non-empty paragraph, cut to 500 characters plus "..." when longer. */
export function firstParagraph(text: string): string {
  const paragraph = text
    .split(/\n\s*\n/)
    .map(p => p.trim())
    .find(p => p.length > 0) ?? '';
  if (paragraph.length > SUMMARY_FALLBACK_CHARS) {
    return paragraph.slice(0, SUMMARY_FALLBACK_CHARS) + '...';
  }
  return paragraph;
}

const LIST_MARKER = /^\s*(?:[-*•+]|\d{1,3}[.)]|[（(]\d{1,3}[)）])\s+/;

/**
 * List items of a block: bullet or numbered lines, with continuation lines
 * folded in. Blocks without list markers split into paragraphs.
 */
export function splitItems(block: string): string[] {
  const lines = block.split('\n');
  if (!lines.some(line => LIST_MARKER.test(line))) {
    return block
      .split(/\n\s*\n/)
      .map(p => stripEmphasis(p.replace(/\s*\n\s*/g, ' ')))
      .filter(p => p.length > 0);
  }

  const items: string[] = [];
  let current: string | undefined;
  for (const line of lines) {
    if (LIST_MARKER.test(line)) {
      if (current !== undefined) items.push(current);
      current = line.replace(LIST_MARKER, '').trim();
    } else if (current !== undefined && line.trim()) {
      current += ' ' + line.trim();
    }
  }
  if (current !== undefined) items.push(current);
  return items.map(stripEmphasis).filter(item => item.length > 0);
}

// ---------------------------------------------------------------------------
// Field parsing for conclusions, recommendations and risks
// ---------------------------------------------------------------------------

export function parseConclusion(text: string): Conclusion {
  const annotations: Array<[RegExp, number]> = [
    [/\(?\s*confidence\s*[:：=]\s*(\d+(?:\.\d+)?)\s*(%)?\s*\)?/i, 1],
    [/\(?\s*(\d+(?:\.\d+)?)\s*%\s*confidence\s*\)?/i, 1]
  ];

  for (const [regex, group] of annotations) {
    const match = regex.exec(text);
    if (match) {
      let confidence = Number(match[group]);
      if (match[0].includes('%') || confidence > 1) {
        confidence = confidence / 100;
      }
      const statement = (text.slice(0, match.index) + text.slice(match.index + match[0].length))
        .replace(/\s{2,}/g, ' ')
        .replace(/\s+([.,;])/g, '$1')
        .trim();
      return { statement, confidence: clamp01(confidence) };
    }
  }
  return { statement: text.trim() };
}

const RECOMMENDATION_FIELD = /\b(priority|rationale|timeline|reason|timeframe)\s*[:：]\s*/gi;

export function parseRecommendation(text: string): Recommendation {
  const fields: Record<string, string> = {};
  const matches = [...text.matchAll(RECOMMENDATION_FIELD)];

  const firstIndex = matches.length > 0 ? matches[0].index ?? text.length : text.length;
  const action = text.slice(0, firstIndex).replace(/[\s;,|(–-]+$/, '').trim();

  matches.forEach((match, i) => {
    const start = (match.index ?? 0) + match[0].length;
    const end = i + 1 < matches.length ? matches[i + 1].index ?? text.length : text.length;
    let key = match[1].toLowerCase();
    if (key === 'reason') key = 'rationale';
    if (key === 'timeframe') key = 'timeline';
    fields[key] = text.slice(start, end).replace(/[\s;,|()–-]+$/, '').replace(/\.$/, '').trim();
  });

  const recommendation: Recommendation = {
    action: action || text.trim(),
    priority: normalizePriority(fields.priority, action || text)
  };
  if (fields.rationale) recommendation.rationale = fields.rationale;
  if (fields.timeline) recommendation.timeline = fields.timeline;
  return recommendation;
}

const LEVEL_WORDS: Array<[RegExp, number]> = [
  [/^(very high|critical|severe|certain)/i, 0.9],
  [/^(high|significant|likely|major)/i, 0.75],
  [/^(medium|moderate|possible)/i, 0.5],
  [/^(very low|negligible|remote|unlikely)/i, 0.1],
  [/^(low|minor)/i, 0.25]
];

function levelValue(raw: string): number | undefined {
  const numeric = /^(\d+(?:\.\d+)?)\s*(%)?/.exec(raw);
  if (numeric) {
    const value = Number(numeric[1]);
    return clamp01(numeric[2] || value > 1 ? value / 100 : value);
  }
  for (const [regex, value] of LEVEL_WORDS) {
    if (regex.test(raw)) return value;
  }
  return undefined;
}

function dimensionValue(text: string, dimension: 'likelihood' | 'impact'): number | undefined {
  const explicit = new RegExp(`${dimension}\\s*[:：=]\\s*([\\w.%]+(?:\\s+\\w+)?)`, 'i').exec(text);
  if (explicit) {
    const value = levelValue(explicit[1]);
    if (value !== undefined) return value;
  }
  const prefixed = new RegExp(`((?:very\\s+)?\\w+)\\s+${dimension}`, 'i').exec(text);
  if (prefixed) {
    return levelValue(prefixed[1]);
  }
  return undefined;
}

const EXPLICIT_LEVEL_FIELD =
  /\b(?:likelihood|impact)\s*[:：=]\s*(?:\d+(?:\.\d+)?%?|(?:very\s+)?(?:high|low)|critical|severe|certain|significant|likely|major|medium|moderate|possible|negligible|remote|unlikely|minor)(?![\w])/gi;

export function parseRiskFactor(text: string): RiskFactor {
  const likelihood = dimensionValue(text, 'likelihood') ?? 0.5;
  const impact = dimensionValue(text, 'impact') ?? 0.5;

  const mitigationMatch = /\bmitigation\s*[:：]\s*(.+)$/i.exec(text);
  const description = (mitigationMatch ? text.slice(0, mitigationMatch.index) : text)
    .replace(EXPLICIT_LEVEL_FIELD, '')
    .replace(/[\s;,|(–-]+$/, '')
    .replace(/\(\s*[,;]?\s*\)/g, '')
    .trim();

  const factor: RiskFactor = {
    description: description || text.trim(),
    likelihood,
    impact,
    score: computeRiskFactorScore(likelihood, impact)
  };
  if (mitigationMatch) factor.mitigation = mitigationMatch[1].trim();
  return factor;
}

// ---------------------------------------------------------------------------
// Structured parsing
// ---------------------------------------------------------------------------

/** Body of the first fenced code block, or the outermost {...} span. */
export function stripCodeFences(raw: string): string {
  const fenced = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced) {
    return fenced[1].trim();
  }
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start >= 0 && end > start) {
    return raw.slice(start, end + 1);
  }
  return raw.trim();
}

function toSection(wire: WireLeafSection, order: number): ReportSection {
  const section: ReportSection = { title: wire.title, content: wire.content, order };
  if (wire.tables && wire.tables.length > 0) section.tables = wire.tables;
  if (wire.figures && wire.figures.length > 0) section.figures = wire.figures;
  return section;
}

function parseStructured(raw: string, fallbackTitle: string): Omit<ReportContent, 'citations' | 'rawOutput'> {
  const json: unknown = JSON.parse(stripCodeFences(raw));
  const wire = StructuredReportSchema.parse(json);

  if (!wire.executive_summary.trim() && wire.sections.length === 0) {
    throw new Error('structured output has neither summary nor sections');
  }

  const sections = wire.sections.map((s, i) => {
    const section = toSection(s, i + 1);
    if (s.sub_sections && s.sub_sections.length > 0) {
      section.subSections = s.sub_sections.map((sub, j) => toSection(sub, j + 1));
    }
    return section;
  });

  const conclusions = wire.conclusions.map(c =>
    typeof c === 'string'
      ? parseConclusion(c)
      : {
          statement: c.statement,
          ...(c.confidence !== undefined ? { confidence: clamp01(c.confidence > 1 ? c.confidence / 100 : c.confidence) } : {}),
          ...(c.supporting_evidence ? { supportingEvidence: c.supporting_evidence } : {})
        }
  );

  const recommendations = wire.recommendations.map(r => {
    if (typeof r === 'string') return parseRecommendation(r);
    const rec: Recommendation = { action: r.action, priority: normalizePriority(r.priority, r.action) };
    if (r.rationale) rec.rationale = r.rationale;
    if (r.timeline) rec.timeline = r.timeline;
    return rec;
  });

  let riskAssessment: RiskAssessment | undefined;
  if (wire.risk_assessment && wire.risk_assessment.factors.length > 0) {
    const factors = wire.risk_assessment.factors.map(f => {
      const factor: RiskFactor = {
        description: f.description,
        likelihood: clamp01(f.likelihood),
        impact: clamp01(f.impact),
        score: computeRiskFactorScore(f.likelihood, f.impact)
      };
      if (f.mitigation) factor.mitigation = f.mitigation;
      return factor;
    });
    riskAssessment = buildRiskAssessment(factors);
  }

  return {
    title: wire.title?.trim() || fallbackTitle,
    executiveSummary: wire.executive_summary.trim(),
    sections,
    conclusions,
    recommendations,
    ...(riskAssessment ? { riskAssessment } : {})
  };
}

// ---------------------------------------------------------------------------
// Narrative parsing
// ---------------------------------------------------------------------------

type SectionKind = 'summary' | 'conclusion' | 'recommendation' | 'risk' | 'general';

const SECTION_KIND_PATTERNS: Array<[SectionKind, RegExp]> = [
  ['summary', /(executive\s+)?summary|摘要|概要|概述/i],
  ['conclusion', /conclusion|结论/i],
  ['recommendation', /recommendation|next steps|建议/i],
  ['risk', /risk|风险/i]
];

export function classifySectionTitle(title: string): SectionKind {
  for (const [kind, pattern] of SECTION_KIND_PATTERNS) {
    if (pattern.test(title)) return kind;
  }
  return 'general';
}

interface HeadingBlock {
  level: number;
  title: string;
  body: string;
}

const HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;

function splitHeadings(raw: string): { preamble: string; blocks: HeadingBlock[] } {
  const blocks: HeadingBlock[] = [];
  const preamble: string[] = [];
  let current: { level: number; title: string; lines: string[] } | undefined;

  for (const line of raw.split('\n')) {
    const heading = HEADING.exec(line);
    if (heading) {
      if (current) blocks.push({ level: current.level, title: current.title, body: current.lines.join('\n').trim() });
      current = { level: heading[1].length, title: stripEmphasis(heading[2]), lines: [] };
    } else if (current) {
      current.lines.push(line);
    } else {
      preamble.push(line);
    }
  }
  if (current) blocks.push({ level: current.level, title: current.title, body: current.lines.join('\n').trim() });

  return { preamble: preamble.join('\n').trim(), blocks };
}

function parseNarrative(raw: string, fallbackTitle: string): Omit<ReportContent, 'citations' | 'rawOutput'> {
  const { preamble, blocks } = splitHeadings(raw);
  if (blocks.length === 0) {
    throw new Error('narrative output has no headings');
  }

  let title = '';
  let executiveSummary = '';
  const sections: ReportSection[] = [];
  const conclusions: Conclusion[] = [];
  const recommendations: Recommendation[] = [];
  const riskFactors: RiskFactor[] = [];
  let parent: ReportSection | undefined;
  let parentLevel = 0;

  blocks.forEach((block, i) => {
    const kind = classifySectionTitle(block.title);

    if (kind === 'general' && block.level === 1 && !title && i === 0) {
      title = block.title;
      if (block.body && !executiveSummary) executiveSummary = firstParagraph(block.body);
      return;
    }
    if (kind !== 'general') {
      parent = undefined;
    }

    switch (kind) {
      case 'summary':
        if (block.body) executiveSummary = block.body;
        return;
      case 'conclusion':
        conclusions.push(...splitItems(block.body).map(parseConclusion));
        return;
      case 'recommendation':
        recommendations.push(...splitItems(block.body).map(parseRecommendation));
        return;
      case 'risk': {
        const factors = splitItems(block.body).map(parseRiskFactor);
        if (factors.length > 0) {
          riskFactors.push(...factors);
          return;
        }
        break;
      }
      default:
        break;
    }

    if (parent && block.level > parentLevel) {
      const subSections = parent.subSections ?? [];
      subSections.push({ title: block.title, content: block.body, order: subSections.length + 1 });
      parent.subSections = subSections;
      return;
    }

    const section: ReportSection = { title: block.title, content: block.body, order: sections.length + 1 };
    sections.push(section);
    parent = section;
    parentLevel = block.level;
  });

  if (!executiveSummary) {
    executiveSummary = firstParagraph(preamble || sections[0]?.content || '');
  }

  return {
    title: title || fallbackTitle,
    executiveSummary,
    sections,
    conclusions,
    recommendations,
    ...(riskFactors.length > 0 ? { riskAssessment: buildRiskAssessment(riskFactors) } : {})
  };
}

// ---------------------------------------------------------------------------
// Bullet parsing
// ---------------------------------------------------------------------------

const BULLET_CONCLUSION = /^(conclusion|结论)\s*[:：]\s*/i;
const BULLET_RECOMMENDATION = /^(recommendation|recommend|建议)\s*[:：]\s*/i;

function parseBullet(raw: string, fallbackTitle: string): Omit<ReportContent, 'citations' | 'rawOutput'> {
  const { preamble, blocks } = splitHeadings(raw);
  const title = blocks.find(b => b.level === 1)?.title ?? fallbackTitle;
  const body = blocks.length > 0 ? [preamble, ...blocks.map(b => b.body)].join('\n') : raw;

  if (!body.split('\n').some(line => LIST_MARKER.test(line))) {
    throw new Error('bullet output has no list items');
  }

  const items = splitItems(body);
  if (items.length === 0) {
    throw new Error('bullet output has no list items');
  }
  const [summary, ...points] = items;
  const sections: ReportSection[] = [];
  const conclusions: Conclusion[] = [];
  const recommendations: Recommendation[] = [];

  for (const point of points) {
    if (BULLET_CONCLUSION.test(point)) {
      conclusions.push(parseConclusion(point.replace(BULLET_CONCLUSION, '')));
    } else if (BULLET_RECOMMENDATION.test(point)) {
      recommendations.push(parseRecommendation(point.replace(BULLET_RECOMMENDATION, '')));
    } else {
      sections.push({ title: `Point ${sections.length + 1}`, content: point, order: sections.length + 1 });
    }
  }

  return { title, executiveSummary: summary, sections, conclusions, recommendations };
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Single-section report holding the whole output. Used whenever the
 * requested format cannot be parsed.
 */
export function degradedContent(raw: string, title: string = DEFAULT_REPORT_TITLE): ReportContent {
  return {
    title,
    executiveSummary: firstParagraph(raw),
    sections: [{ title: FALLBACK_SECTION_TITLE, content: raw.trim(), order: 1 }],
    conclusions: [],
    recommendations: [],
    citations: extractCitations(raw),
    rawOutput: raw
  };
}

/**
 * Parses raw model text into report content. Only empty output throws;
 * any other parse failure degrades to a single "Full Analysis" section.
 */
export function parseLLMOutput(
  raw: string,
  format: OutputFormat = OutputFormat.Narrative,
  title: string = DEFAULT_REPORT_TITLE
): ReportContent {
  if (!raw || !raw.trim()) {
    throw new EmptyModelOutputError();
  }

  try {
    let parsed: Omit<ReportContent, 'citations' | 'rawOutput'>;
    switch (format) {
      case OutputFormat.Structured:
        parsed = parseStructured(raw, title);
        break;
      case OutputFormat.Bullet:
        parsed = parseBullet(raw, title);
        break;
      default:
        parsed = parseNarrative(raw, title);
        break;
    }
    return { ...parsed, citations: extractCitations(raw), rawOutput: raw };
  } catch (error) {
    logger.warn(`${format} parse failed, degrading to single section: ${describeError(error)}`);
    return degradedContent(raw, title);
  }
}
