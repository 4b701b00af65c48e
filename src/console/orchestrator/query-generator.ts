/**
 * Query Generator
 *
 * Turns a question plus persona context into one read-only PostgreSQL
 * statement. Serves the fallback query, Discovery and Analysis. A failure
 * here means no data can be retrieved for that stage, so it is reported as
 * a StoreQueryError tagged with the stage.
 */

import type { QueryGenerator, QueryGenerationRequest } from '../../common/types.js';
import { errorMessage } from '../../common/utils/timeout.js';
import { StoreQueryError } from './errors.js';
import type { CompletionClient } from './claude-client.js';

const STAGE_TASKS: Record<QueryGenerationRequest['stage'], string> = {
  fallback: 'Write one query that answers the question directly. Use fuzzy matching (ILIKE) on names and codes.',
  discovery:
    'STAGE 1 TASK: Write a broad, high-recall discovery query that surfaces candidate records for the question. Do not try to answer it yet.',
  analysis:
    'STAGE 2 TASK: Write a focused analysis query over the selected candidates that answers the question.',
};

/**
 * Remove code fences, a leading "sql" tag and a trailing semicolon
 */
export function cleanGeneratedSql(text: string): string {
  return text
    .replace(/```sql/gi, '')
    .replace(/```/g, '')
    .trim()
    .replace(/;\s*$/, '')
    .trim();
}

const QUOTED_OR_COMMENT = /'(?:[^']|'')*'|"(?:[^"]|"")*"|--[^\n]*|\/\*[\s\S]*?\*\//g;
const WRITE_KEYWORD = /\b(insert|update|delete|merge|drop|alter|create|truncate|grant|revoke|into)\b/i;

/**
 * Statement text with string literals, quoted identifiers and comments blanked out
 */
export function stripQuotedText(sql: string): string {
  return sql.replace(QUOTED_OR_COMMENT, (match) => {
    if (match.startsWith("'")) return "''";
    if (match.startsWith('"')) return '""';
    return ' ';
  });
}

/**
 * Only single SELECT / WITH statements without write keywords reach the warehouse
 */
export function isReadOnlyStatement(sql: string): boolean {
  const code = stripQuotedText(sql).trim();
  if (!/^(select|with)\b/i.test(code)) return false;
  if (code.includes(';')) return false;
  return !WRITE_KEYWORD.test(code);
}

export function buildQueryPrompt(request: QueryGenerationRequest): string {
  const sections: string[] = [];

  if (request.stageTemplate) {
    sections.push(request.stageTemplate);
  }

  sections.push(`DOMAIN CONTEXT:\n${request.personaContext}`);

  if (request.priorContext) {
    sections.push(`PRIOR STAGE RESULTS:\n${request.priorContext}`);
  }

  sections.push(`USER QUESTION: "${request.question}"`);
  sections.push(STAGE_TASKS[request.stage]);

  const rules = [
    '- PostgreSQL dialect, a single SELECT (or WITH ... SELECT) statement',
    '- Use only tables and columns named in the domain context',
    '- Include JOINs only when several tables are needed',
  ];
  if (request.limit !== undefined) {
    rules.push(`- Return at most ${request.limit} rows (LIMIT ${request.limit})`);
  }
  rules.push('- Return ONLY the SQL, nothing else');
  sections.push(`RULES:\n${rules.join('\n')}`);

  return sections.join('\n\n');
}

export class ClaudeQueryGenerator implements QueryGenerator {
  constructor(private readonly client: CompletionClient) {}

  async generate(request: QueryGenerationRequest): Promise<string> {
    let text: string;
    try {
      const response = await this.client.complete(buildQueryPrompt(request), {
        system: 'You are an expert SQL assistant for a PostgreSQL data warehouse.',
        maxTokens: 512,
        temperature: 0,
      });
      text = response.text;
    } catch (error) {
      throw new StoreQueryError(
        `Query generation failed: ${errorMessage(error)}`,
        request.stage,
        undefined,
        { cause: error }
      );
    }

    const sql = cleanGeneratedSql(text);
    if (!sql) {
      throw new StoreQueryError('Query generation returned no SQL', request.stage);
    }
    if (!isReadOnlyStatement(sql)) {
      throw new StoreQueryError('Generated SQL is not a single read-only statement', request.stage, sql);
    }
    return sql;
  }
}
