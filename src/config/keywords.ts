/**
 * Keywords searched for in bulletin text
 */

export const BULLETIN_KEYWORDS = [
  'CFDI 4.0',
  'Anexo 20',
  'contabilidad electrónica',
  'e.firma',
] as const;
