export const SPEC_SHEET_SUFFIX = "_spec.pdf";

/** Keep letters and digits (any script), space, "-" and "_". */
export function safeFileName(name: string): string {
  return name.replace(/[^\p{L}\p{N} _-]/gu, "");
}

export function specSheetFileName(productName: string): string {
  return `${safeFileName(productName)}${SPEC_SHEET_SUFFIX}`;
}
