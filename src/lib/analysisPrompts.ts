/**
 * Prompts for the per-document stages (text extraction, image analysis,
 * translation) and the corpus summary. The grouping prompt lives in
 * groupingPrompt.ts.
 */

// ── Text extraction ─────────────────────────────────────────────────────────

export const TEXT_EXTRACTION_PROMPT = `You are analyzing a text file from an investigative document release.

TASK: Extract and structure the content of this text file.

REQUIREMENTS:
1. CONTENT EXTRACTION: extract all text content preserving structure; identify sections; preserve paragraph breaks and line structure.
2. CONTEXT UNDERSTANDING: determine the document type (conversation, transcript, article, memo, etc.); identify participants; note dates and main topics.
3. ENTITY EXTRACTION: extract all dates, names (people, organizations), locations, document references and key events.

OUTPUT FORMAT (STRICT JSON ONLY - NO MARKDOWN, NO CODE BLOCKS, NO EXPLANATIONS):
{
  "file_name": "<filename>",
  "content": {
    "full_text": "<complete_text_content>",
    "sections": [{ "section_index": <number>, "section_type": "<header|paragraph|list|quote|etc>", "text": "<section_text>" }]
  },
  "metadata": {
    "document_type": "<type>",
    "participants": ["<name1>"],
    "date_range": { "earliest": "<date_or_null>", "latest": "<date_or_null>" },
    "file_references": ["<file_number>"]
  },
  "structured_data": {
    "people": ["<name1>"],
    "organizations": ["<org1>"],
    "locations": ["<loc1>"],
    "dates": ["<date1>"],
    "events": ["<event1>"]
  },
  "themes": ["<theme1>"],
  "confidence": 0.0,
  "notes": "<any_observations>"
}

CRITICAL RULES:
- Output ONLY valid JSON. Start your response with { and end with }.
- Extract text exactly as it appears. Do not summarize or rewrite content.
- Note any unclear or damaged sections.`;

export function buildTextExtractionPrompt(fileName: string, text: string): string {
  return `${TEXT_EXTRACTION_PROMPT}

File name: ${fileName}

--- TEXT FILE ---
${text}
--- END TEXT FILE ---`;
}

// ── Image analysis ──────────────────────────────────────────────────────────

export const IMAGE_ANALYSIS_PROMPT = `You are analyzing an image from an investigative document release.

TASK: Perform a comprehensive analysis of this image and extract all information.

1. TEXT EXTRACTION (OCR): extract ALL visible text exactly as it appears, preserving line breaks; note whether it is handwritten, typed or printed; include labels, stamps and annotations.
2. VISUAL DESCRIPTION: image type (document, photograph, diagram, etc.), layout, visible objects, people or scenes, quality and damage.
3. STRUCTURED EXTRACTION: dates, names (people, organizations), document or case numbers, signatures and stamps, addresses, phone numbers, email addresses, financial amounts.
4. CONTEXT ANALYSIS: document type, sender/recipient, subject, references to other documents.

OUTPUT FORMAT (STRICT JSON):
{
  "file_name": "<filename>",
  "image_analysis": { "type": "<document|photograph|diagram|other>", "description": "<detailed_description>", "layout": "<structure>", "quality": "<high|medium|low>", "orientation": "<portrait|landscape>" },
  "text_extraction": {
    "full_text": "<complete_extracted_text>",
    "text_regions": [{ "region": "<header|body|footer|margin|stamp|etc>", "text": "<text>", "type": "<handwritten|typed|printed>" }]
  },
  "structured_data": {
    "dates": ["<date1>"],
    "people": ["<name1>"],
    "organizations": ["<org1>"],
    "locations": ["<address1>"],
    "document_numbers": ["<ref1>"],
    "financial_amounts": ["<amount1>"],
    "contact_info": { "phone_numbers": [], "email_addresses": [], "addresses": [] },
    "signatures": ["<signature_text>"],
    "stamps_or_markings": ["<description>"]
  },
  "document_metadata": {
    "document_type": "<letter|memo|form|photo|etc>",
    "sender": "<name_or_null>",
    "recipient": "<name_or_null>",
    "subject": "<subject_or_null>",
    "date": "<primary_date_or_null>",
    "references": ["<file_number>"]
  },
  "confidence": { "text_extraction": 0.0, "structured_data": 0.0, "overall": 0.0 },
  "notes": "<any_uncertainties_or_observations>"
}

CRITICAL RULES:
- Extract text exactly as it appears; do not correct or normalize.
- If text is unclear, write "[unclear: <best_guess>]".
- Do not invent information not visible in the image.
- Return ONLY valid JSON. No markdown fences, no commentary.`;

// ── Spreadsheets ────────────────────────────────────────────────────────────

export const SPREADSHEET_ANALYSIS_PROMPT = `You are analyzing an Excel spreadsheet from an investigative document release.

TASK: Analyze this spreadsheet comprehensively and extract all relevant information.

REQUIREMENTS:
1. STRUCTURE ANALYSIS:
   - Identify all worksheets/tabs and the purpose of each
   - Note column headers and data types
   - Identify any formulas or calculated fields

2. DATA EXTRACTION:
   - Extract all tabular data preserving structure
   - Identify date fields and normalize formats
   - Extract all names, organizations, locations mentioned

3. RELATIONSHIP MAPPING:
   - Identify connections between entities (people, organizations, dates, locations)
   - Extract transaction amounts, quantities, or other numerical relationships
   - Identify patterns or sequences

4. CONTEXT UNDERSTANDING:
   - Determine what this spreadsheet documents (financial records, contacts, schedules, etc.)
   - Note any references to other documents or file numbers
   - Identify key dates and time periods covered

OUTPUT FORMAT (STRICT JSON):
{
  "file_name": "<filename>",
  "structure": {
    "worksheets": [
      { "name": "<sheet_name>", "purpose": "<description>", "row_count": <number>, "column_count": <number>, "headers": ["<col1>", ...] }
    ]
  },
  "data": {
    "<sheet_name>": [ { "row_index": <number>, "data": { "<header>": "<value>" } } ]
  },
  "entities": {
    "people": ["<name>", ...],
    "organizations": ["<org>", ...],
    "locations": ["<location>", ...],
    "dates": ["<date>", ...]
  },
  "relationships": [
    { "type": "<relationship_type>", "source": "<entity1>", "target": "<entity2>", "context": "<description>", "evidence": "<supporting_data>" }
  ],
  "context": {
    "document_type": "<type>",
    "time_period": "<start_date> to <end_date>",
    "key_themes": ["<theme>", ...],
    "references": ["<file_number>", ...]
  },
  "confidence": 0.0-1.0,
  "notes": "<any_uncertainties_or_observations>"
}

CRITICAL RULES:
- Extract ONLY what is present in the spreadsheet
- Do not infer relationships not explicitly shown
- Preserve exact text, dates, and numbers as they appear
- If a field is empty, give it as null rather than omitting it
- Return ONLY valid JSON. No markdown fences, no commentary.`;

export function buildSpreadsheetPrompt(workbookText: string): string {
  return `${SPREADSHEET_ANALYSIS_PROMPT}

--- EXCEL DATA ---
${workbookText}
--- END EXCEL DATA ---`;
}

// ── Page transcription (OCR) ────────────────────────────────────────────────

export const PAGE_TRANSCRIPTION_PROMPT = `This is a single page image from an investigative document release.
Transcribe the text exactly as it appears (handwritten, typed, stamped, etc.).
Do not add numbering, bullets, labels, or commentary.
Do not prefix lines with numbers or symbols.
Return only the raw text with original line breaks.`;

// ── Translation ─────────────────────────────────────────────────────────────

export function buildTranslationPrompt(sourceText: string): string {
  return `Translate the following document page(s) to natural, idiomatic English.
Preserve meaning, dates, names, and paragraph breaks.
Do not add headings, numbering, labels, or commentary.
Output only the translated text.

--- BEGIN SOURCE TEXT ---
${sourceText}
--- END SOURCE TEXT ---`;
}

// ── Strategic summary ───────────────────────────────────────────────────────

export const STRATEGIC_SUMMARY_PROMPT = `You are analyzing documents from an investigative document release. You have been given aggregated data from ALL processed documents.

Create a STRATEGIC, HIGH-LEVEL summary that journalists and investigators can use. Focus on:

1. NAMED INDIVIDUALS: List ALL people explicitly named or identified across all documents
2. MOST EXPLOSIVE FINDINGS: The top 5-10 most significant revelations (ranked by newsworthiness)
3. DOCUMENT SCOPE: What types of evidence, date ranges, sources
4. PATTERNS & CONNECTIONS: Relationships, recurring themes, timeline patterns
5. LEGAL/FINANCIAL IMPLICATIONS: Potential violations, financial dealings, legal significance

FORMAT - Start directly with sections (NO preamble):

### Named Individuals Identified
[List all named people with brief context for each]

### Most Explosive Findings
[Ranked list of 5-10 most significant revelations with document references]

### Document Analysis
- Total documents processed: [number]
- Date range: [if identifiable]
- Document types: [photos, financial records, communications, etc.]

### Key Patterns & Connections
[Identify relationships, recurring locations, timeline connections]

### Legal & Financial Significance
[Potential implications, violations, financial dealings]

Be specific, factual, and concise. Total length: 400-600 words. Prioritize newsworthiness and verifiable facts.`;
