import fs from 'fs';
import path from 'path';
import { Findings } from '../evaluation/types';
import { buildFindingsDocument, renderReport } from '../reporting/reporter';
import { StatusSymbols, UNICODE_SYMBOLS } from '../reporting/status-symbols';
import { logger } from '../observability/logger';

export const REPORT_FILENAME = 'eval_report.txt';
export const FINDINGS_FILENAME = 'eval_findings.json';

export interface EvalArtifacts {
  reportPath: string;
  findingsPath: string;
}

/** Write the text report and the findings document into `outputDir` */
export async function writeEvalArtifacts(
  outputDir: string,
  findings: readonly Findings[],
  symbols: StatusSymbols = UNICODE_SYMBOLS,
): Promise<EvalArtifacts> {
  await fs.promises.mkdir(outputDir, { recursive: true });

  const reportPath = path.join(outputDir, REPORT_FILENAME);
  const findingsPath = path.join(outputDir, FINDINGS_FILENAME);

  await fs.promises.writeFile(reportPath, renderReport(findings, symbols) + '\n', 'utf-8');
  await fs.promises.writeFile(findingsPath, JSON.stringify(buildFindingsDocument(findings), null, 2) + '\n', 'utf-8');

  logger.info({ reportPath, findingsPath, tasks: findings.length }, 'Evaluation artifacts written');
  return { reportPath, findingsPath };
}
