// src/services/report/ReportExporter.ts
import * as fs from 'fs';
import * as path from 'path';
import * as Mustache from 'mustache';
import { format as formatDate } from 'date-fns';
import { ExportFormat, Report, ReportSection, ReportTable } from '../../types/report.types';
import { ExportFormatNotImplementedError, InvalidInputError } from '../../utils/errors';
import { Logger, describeError } from '../../utils/logger';
import { toUnescapedTemplate } from '../prompt/TemplateRegistry';

const logger = new Logger('ReportExporter');

const INLINE_MARKDOWN_TEMPLATE = `# {{title}}

## Executive Summary

{{summary}}

{{#sections}}
{{heading}} {{title}}

{{content}}

{{/sections}}
---
Generated {{generatedAt}} by {{modelId}} {{modelVersion}} | Report {{reportId}}
`;

let cachedTemplate: string | undefined;

function markdownTemplate(): string {
  if (cachedTemplate !== undefined) {
    return cachedTemplate;
  }
  const templatePath = path.join(__dirname, '../../../templates/report-markdown.mustache');
  try {
    cachedTemplate = toUnescapedTemplate(fs.readFileSync(templatePath, 'utf-8'));
    logger.debug('Loaded markdown report template');
  } catch (error) {
    logger.warn(`Could not load report template file, using inline default: ${describeError(error)}`);
    cachedTemplate = toUnescapedTemplate(INLINE_MARKDOWN_TEMPLATE);
  }
  return cachedTemplate;
}

export function renderMarkdownTable(table: ReportTable): string {
  const escapeCell = (cell: string) => cell.replace(/\|/g, '\\|').replace(/\n/g, ' ');
  const width = Math.max(table.headers.length, ...table.rows.map(row => row.length));
  if (width === 0) {
    return '';
  }
  const pad = (cells: string[]) => Array.from({ length: width }, (_, i) => escapeCell(cells[i] ?? ''));
  const line = (cells: string[]) => `| ${cells.join(' | ')} |`;

  return [
    line(pad(table.headers)),
    line(Array.from({ length: width }, () => '---')),
    ...table.rows.map(row => line(pad(row)))
  ].join('\n');
}

interface SectionView {
  heading: string;
  title: string;
  content: string;
  tables: Array<{ title?: string; markdown: string }>;
}

function flattenSections(sections: ReportSection[], depth = 2): SectionView[] {
  return sections.flatMap(section => [
    {
      heading: '#'.repeat(Math.min(depth, 6)),
      title: section.title,
      content: section.content.trim(),
      tables: (section.tables ?? []).map(table => ({ title: table.title, markdown: renderMarkdownTable(table) }))
    },
    ...flattenSections(section.subSections ?? [], depth + 1)
  ]);
}

function round(value: number): string {
  return value.toFixed(2);
}

export function reportMarkdownView(report: Report): Record<string, unknown> {
  const { content } = report;
  return {
    title: content.title,
    summary: content.executiveSummary,
    sections: flattenSections(content.sections),
    hasConclusions: content.conclusions.length > 0,
    conclusions: content.conclusions.map(c => ({
      statement: c.statement,
      confidence: c.confidence !== undefined ? `${Math.round(c.confidence * 100)}%` : undefined
    })),
    hasRecommendations: content.recommendations.length > 0,
    recommendations: content.recommendations.map((r, i) => ({ ...r, index: i + 1 })),
    risk: content.riskAssessment
      ? {
          level: content.riskAssessment.overallLevel,
          score: round(content.riskAssessment.overallScore),
          factors: content.riskAssessment.factors.map(f => ({
            description: f.description,
            likelihood: round(f.likelihood),
            impact: round(f.impact),
            score: round(f.score),
            mitigation: f.mitigation
          }))
        }
      : undefined,
    hasCitations: content.citations.length > 0,
    citations: content.citations.map(c => ({
      id: c.id,
      source: c.source,
      sourceType: c.sourceType,
      status: c.verificationStatus,
      url: c.url
    })),
    generatedAt: formatDate(report.generatedAt, 'yyyy-MM-dd HH:mm:ss'),
    modelId: report.metadata.modelId,
    modelVersion: report.metadata.modelVersion,
    reportId: report.reportId,
    latencyMs: report.latencyMs,
    totalTokens: report.tokensUsed.totalTokens
  };
}

export function renderMarkdown(report: Report): string {
  const rendered = Mustache.render(markdownTemplate(), reportMarkdownView(report));
  return rendered.replace(/\n{3,}/g, '\n\n').trim() + '\n';
}

/**
 * Serialises a report. JSON and Markdown are supported; PDF and DOCX
 * reject with ExportFormatNotImplementedError.
 */
export function exportReport(report: Report | undefined, format: ExportFormat): Buffer {
  if (!report) {
    throw new InvalidInputError('report is required');
  }
  switch (format) {
    case ExportFormat.JSON:
      return Buffer.from(JSON.stringify(report, null, 2), 'utf-8');
    case ExportFormat.Markdown:
      return Buffer.from(renderMarkdown(report), 'utf-8');
    default:
      throw new ExportFormatNotImplementedError(format);
  }
}

/** Inverse of the JSON export; restores the timestamp as a Date. */
export function reportFromJSON(json: string | Buffer): Report {
  const text = typeof json === 'string' ? json : json.toString('utf-8');
  return JSON.parse(text, (key: string, value: unknown) =>
    key === 'generatedAt' && typeof value === 'string' ? new Date(value) : value
  );
}
