export const CHINESE_TEXT_MARKER = '{chinese_text}';
export const ENGLISH_TEXT_MARKER = '{english_text}';

export const TERM_EXTRACTION_TEMPLATE = `As a professional translator and terminologist, extract professional terminology pairs from these parallel Chinese and English texts.

CHINESE TEXT:
${CHINESE_TEXT_MARKER}

ENGLISH TEXT:
${ENGLISH_TEXT_MARKER}

Identify the specialized terms that appear in both texts and pair each Chinese term with its English counterpart.

RULES:
1. Focus on terminology specific to this document's domain
2. Include only terms that appear in both texts
3. Extract ONLY professional/technical terms, not common words
4. Pair each Chinese term with the English term used for it in the English text
5. List each pair once

OUTPUT FORMAT:
One pair per line as ordinal|Chinese term|English term, numbered from 1, with no header and no other text.

Example:
1|数据库|database
2|云计算|cloud computing`;
