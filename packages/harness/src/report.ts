export interface CheckReport {
  name: string;
  /** Number of blocks or transactions examined */
  checked: number;
  failures: string[];
}

export function isOk(report: CheckReport): boolean {
  return report.failures.length === 0;
}

export function mergeReports(name: string, reports: readonly CheckReport[]): CheckReport {
  return {
    name,
    checked: reports.reduce((sum, r) => sum + r.checked, 0),
    failures: reports.flatMap((r) => r.failures),
  };
}

export function formatReport(report: CheckReport): string {
  const verdict = isOk(report) ? 'PASS' : 'FAIL';
  return `${verdict} ${report.name}: ${report.checked} checked, ${report.failures.length} failures`;
}
