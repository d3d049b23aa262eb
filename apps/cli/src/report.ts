/**
 * Modelsync CLI - QC Report Tables
 */

import type { QcScoreReport } from '@modelsync/qc';
import { formatBytes } from '@modelsync/shared';
import { formatTable } from './output.js';

function fixed(value: number | undefined, digits = 2): string {
  return value === undefined ? '-' : value.toFixed(digits);
}

function throughput(value: number, percentOfBase: number): string {
  return value > 0 ? `${value.toFixed(1)} (${Math.round(percentOfBase)}%)` : '-';
}

export function renderReport(report: QcScoreReport): string {
  const lines: string[] = [
    `Model ${report.modelName}, suite ${report.testSuiteName}, ${report.totalQuestions} questions`,
    `Base ${report.baseTag} (${report.baseQuantizationType}, ${formatBytes(report.baseDiskSizeBytes)}), ` +
      `${report.baseEvalTokensPerSecond.toFixed(1)} eval t/s, ${report.basePromptTokensPerSecond.toFixed(1)} prompt t/s`,
  ];
  if (report.judgeModel) lines.push(`Judge ${report.judgeModel}`);

  if (report.quants.length === 0) {
    lines.push('', 'No quantizations to compare yet');
    return lines.join('\n');
  }

  lines.push(
    '',
    formatTable(
      ['TAG', 'QUANT', 'SIZE', 'SCORE', 'JUDGE', 'FINAL', 'BEST A/B/AB', 'EVAL T/S', 'PROMPT T/S'],
      report.quants.map(quant => [
        quant.tag,
        quant.quantizationType,
        formatBytes(quant.diskSizeBytes),
        fixed(quant.totalScore),
        fixed(quant.averageJudgmentScore),
        fixed(quant.finalScore),
        `${quant.bestAnswers.base}/${quant.bestAnswers.candidate}/${quant.bestAnswers.tie}`,
        throughput(quant.evalTokensPerSecond, quant.evalPercentOfBase),
        throughput(quant.promptTokensPerSecond, quant.promptPercentOfBase),
      ])
    )
  );

  const categories: string[] = [];
  for (const quant of report.quants) {
    for (const category of Object.keys(quant.categoryScores)) {
      if (!categories.includes(category)) categories.push(category);
    }
  }

  lines.push(
    '',
    formatTable(
      ['CATEGORY', ...report.quants.map(quant => quant.tag)],
      categories.map(category => [
        category,
        ...report.quants.map(quant => fixed(quant.categoryScores[category], 1)),
      ])
    )
  );

  return lines.join('\n');
}
