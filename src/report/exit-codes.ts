/** Exit code a payload returns when it fails. */
export const PAYLOAD_ERROR_CODE = 1;

export const NO_INFRA_CODES = 'None';

export type ExitCodeClassification = {
  pipeErrorCount: number;
  infraErrorCount: number;
  infraErrorCodes: string;
};

/**
 * Splits a label's exit codes into payload failures and infrastructure
 * failures. Infrastructure codes are listed once each, sorted as strings.
 */
export function classifyExitCodes(
  exitCodes: readonly number[] | undefined,
): ExitCodeClassification {
  if (!exitCodes || exitCodes.length === 0) {
    return { pipeErrorCount: 0, infraErrorCount: 0, infraErrorCodes: NO_INFRA_CODES };
  }
  const pipeErrorCount = exitCodes.filter((code) => code === PAYLOAD_ERROR_CODE).length;
  const infraCodes = exitCodes.filter((code) => code !== 0 && code !== PAYLOAD_ERROR_CODE);
  return {
    pipeErrorCount,
    infraErrorCount: infraCodes.length,
    infraErrorCodes: formatInfraCodes(infraCodes),
  };
}

export function formatInfraCodes(codes: readonly number[]): string {
  if (codes.length === 0) return NO_INFRA_CODES;
  const unique = [...new Set(codes.map((code) => String(code)))];
  return unique.sort().join(', ');
}

export function parseInfraCodes(value: string): number[] {
  if (value === NO_INFRA_CODES || value.trim() === '') return [];
  return value.split(',').map((part) => Number.parseInt(part.trim(), 10));
}
