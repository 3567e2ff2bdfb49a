/**
 * Application-level codes carried in device JSON bodies. An HTTP 200 only
 * says the request arrived; the code says whether it was accepted.
 */
export const RESPONSE_CODES: Readonly<Record<number, string>> = {
  1000: "Ok",
  1001: "Error",
  1101: "Invalid argument value",
  1102: "Error",
  1103: "Error - value too long? Or missing required object key?",
  1104: "Error - malformed JSON on input?",
  1105: "Invalid argument key",
  1107: "OK?",
  1108: "OK?",
  1205: "Error with firmware upgrade - SHA1SUM does not match",
};

export const OK_CODE = 1000;

/** Codes the firmware emits in some flows whose meaning is not known. */
export const AMBIGUOUS_CODES: ReadonlySet<number> = new Set([1107, 1108]);

export function isOkCode(code: number): boolean {
  return code === OK_CODE;
}

export function describeResponseCode(code: number): string {
  const message = RESPONSE_CODES[code] ?? "Unknown";
  const note = AMBIGUOUS_CODES.has(code) ? " (ambiguous, treated as failure)" : "";
  return `${code} ${message}${note}`;
}
