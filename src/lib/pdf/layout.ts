// Page geometry in millimetres, top-left origin. The template bands must
// agree with the artwork in template.pdf; nothing checks that they do.

export const PAGE = {
  width: 210, // A4
  height: 297,
  marginLeft: 20,
  marginRight: 20,
  marginTop: 20,
  autoBreakMargin: 15,
} as const;

export const TEMPLATE_BANDS = {
  headerBottom: 70,
  contentStart: 75,
  contentEnd: 220,
  footerTop: 257,
} as const;

export const TABLE = {
  labelFraction: 0.3,
  valueFraction: 0.7,
  baseRowHeight: 8,
} as const;

// Grey levels, 0 (black) – 255 (white)
export const COLORS = {
  darkRow: 230,
  lightRow: 245,
  labelText: 100,
  bodyText: 0,
  templateBand: 240,
  templateCaption: 128,
  templateGuide: 200,
} as const;

export const FONT_SIZES = {
  title: 24,
  price: 32,
  sectionHeading: 14,
  body: 10,
  templateCaption: 14,
  templateMarker: 12,
} as const;

export const SPACING = {
  titleHeight: 15,
  priceHeight: 20,
  afterPrice: 5,
  beforeUpgrades: 10,
  sectionHeadingHeight: 10,
  afterSectionHeading: 5,
} as const;

export function contentWidth(pageWidth: number = PAGE.width): number {
  return pageWidth - PAGE.marginLeft - PAGE.marginRight;
}

export function pageBreakY(pageHeight: number = PAGE.height): number {
  return pageHeight - PAGE.autoBreakMargin;
}
