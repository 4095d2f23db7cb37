// Typographic characters the standard PDF fonts can't encode, with their
// ASCII stand-ins. Anything else outside printable ASCII becomes a space.
const PDF_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  ["™", "(TM)"],
  ["®", "(R)"],
  ["©", "(C)"],
  ["–", "-"],
  ["—", "--"],
  ["‘", "'"],
  ["’", "'"],
  ["“", '"'],
  ["”", '"'],
  ["…", "..."],
];

// Anything the standard fonts can't draw, control characters included
const NOT_PRINTABLE_ASCII = /[^\x20-\x7e]/g;

export function cleanTextForPdf(text: string): string {
  let cleaned = text;
  for (const [char, replacement] of PDF_REPLACEMENTS) {
    cleaned = cleaned.split(char).join(replacement);
  }

  return cleaned.replace(NOT_PRINTABLE_ASCII, " ").replace(/\s+/g, " ").trim();
}
