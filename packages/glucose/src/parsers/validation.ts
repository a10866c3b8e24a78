/**
 * Row filters for meter exports
 */

const KETONE = /ketone/i;
const FINGERSTICK = /blood/i;

/**
 * Ketone measurements share the export but are not glucose readings
 */
export function isKetoneRow(measureMethod: string, comment: string): boolean {
  return KETONE.test(measureMethod) || KETONE.test(comment);
}

/**
 * Manual finger-stick tests are exported with a "blood sample" method
 */
export function isFingerstickRow(measureMethod: string): boolean {
  return FINGERSTICK.test(measureMethod);
}

/**
 * Validate a glucose value is a usable number
 */
export function isValidGlucose(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}
