/**
 * Filter Module
 */

export { matchKeywords } from './matcher.js';
export { BULLETIN_KEYWORDS } from '../config/keywords.js';
