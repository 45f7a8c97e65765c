/**
 * Instructions sent with structuring and summary calls
 *
 * @module services/structuring/prompts
 */

export const PAGE_STRUCTURING_PROMPT = `You are a highly capable document extraction assistant.
Analyze the provided text (German or English) and extract structured data into a valid JSON object.

REQUIRED OUTPUT STRUCTURE:
{
  "summary": "A concise 50-100 word summary of the page content",
  "keywords": ["keyword1", "keyword2"],
  "sections": [{"title": "Section Title", "content": "Section content summary"}],
  "measurements": [{"value": 12.5, "unit": "mm", "context": "description of measurement"}],
  "key_fields": {"invoice_date": "YYYY-MM-DD", "document_number": "...", "names": ["..."]},
  "tables": [[{"col1": "val1", "col2": "val2"}]]
}

RULES:
1. Output valid JSON only. NO markdown code fences (e.g. \`\`\`json).
2. 'summary' is concise but informative (50-100 words).
3. 'keywords' holds 5-15 important terms, names and technical terms for search.
4. If a field is empty, return an empty list [] or empty object {}.
5. 'tables' is a list of tables, each a list of rows (lists or column maps).
6. Extract all dates, numbers and important entity names into 'key_fields'.
7. Tolerate OCR errors in the input.
8. Prefer accuracy over completeness for long pages.`;

export const DOCUMENT_SUMMARY_PROMPT = `You are an expert executive assistant.
Write a coherent, concise executive summary (100-200 words) of the ENTIRE document based on the provided page summaries.

GUIDELINES:
1. Synthesize the information, do not list what is on each page.
2. Name the core purpose, the main findings and the key dates and entities.
3. Write in the same language as the document (German or English).
4. Focus on the big picture.`;

export function buildStructuringMessage(text: string): string {
  return `Text to structure:\n\n${text}`;
}

export function buildSummaryMessage(context: string): string {
  return `Here are the summaries of the document pages:\n\n${context}`;
}

/**
 * "Page i: summary" blocks, 1-based, separated by blank lines
 */
export function buildPageSummaryContext(pageSummaries: readonly string[]): string {
  return pageSummaries.map((summary, index) => `Page ${index + 1}: ${summary}`).join('\n\n');
}
