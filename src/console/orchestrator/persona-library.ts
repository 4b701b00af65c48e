/**
 * Persona Library
 *
 * Loads persona modules (prompts/personas/<name>.md) and stage templates
 * (prompts/intent/<stage>.md) from disk. Contents are cached for the
 * process lifetime; a missing file yields a placeholder string so that a
 * misconfigured persona degrades the prompt, never the request.
 */

import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import type { PersonaContextSource } from '../../common/types.js';
import { getOrchestratorConfig } from './config.js';
import { logWarn } from '../../common/services/logger.js';

export type StageTemplateName = 'stage1_discovery' | 'stage2_analysis' | 'stage3_evaluation';

/**
 * Persona entry shown to the classifier
 */
export interface PersonaSummary {
  name: string;
  description: string;
  /** Backticked identifiers found in the persona module */
  tables: string[];
}

const DESCRIPTION_MAX_CHARS = 100;

/**
 * First paragraph after the first "##" heading, cut to 100 chars
 */
export function extractDescription(markdown: string): string {
  const lines = markdown.split(/\r?\n/);
  const headingIndex = lines.findIndex((line) => line.startsWith('##'));
  if (headingIndex === -1) {
    return 'Available persona';
  }

  const paragraph: string[] = [];
  for (const line of lines.slice(headingIndex + 1)) {
    const trimmed = line.trim();
    if (!trimmed) {
      if (paragraph.length > 0) break;
      continue;
    }
    if (trimmed.startsWith('#')) break;
    paragraph.push(trimmed);
  }

  const description = paragraph.join(' ');
  if (!description) {
    return 'Available persona';
  }
  return description.length > DESCRIPTION_MAX_CHARS
    ? `${description.substring(0, DESCRIPTION_MAX_CHARS)}...`
    : description;
}

/**
 * Backticked identifiers opening a list item, e.g. "- `product_master`: ..."
 */
export function extractTableNames(markdown: string): string[] {
  const tables = new Set<string>();
  for (const match of markdown.matchAll(/^\s*[-*]\s+`([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?)`/gm)) {
    tables.add(match[1]);
  }
  return [...tables];
}

export class PersonaLibrary implements PersonaContextSource {
  private cache = new Map<string, string>();

  constructor(private readonly promptsDir: string) {}

  private read(relativePath: string, placeholder: string): string {
    const cached = this.cache.get(relativePath);
    if (cached !== undefined) {
      return cached;
    }

    const fullPath = join(this.promptsDir, relativePath);
    if (!existsSync(fullPath)) {
      logWarn('Prompt file not found', { path: fullPath });
      return placeholder;
    }

    const content = readFileSync(fullPath, 'utf-8');
    this.cache.set(relativePath, content);
    return content;
  }

  /**
   * Persona module text, or a placeholder naming the missing module
   */
  loadPersona(persona: string): string {
    return this.read(
      join('personas', `${persona}.md`),
      `Persona module '${persona}' not found. Answer using general business knowledge.`
    );
  }

  /**
   * Stage template text, or a placeholder naming the missing template
   */
  loadStageTemplate(stage: StageTemplateName): string {
    return this.read(join('intent', `${stage}.md`), `Stage template '${stage}' not found.`);
  }

  /**
   * Personas available on disk, sorted by name
   */
  listPersonas(): PersonaSummary[] {
    const dir = join(this.promptsDir, 'personas');
    if (!existsSync(dir)) {
      return [];
    }

    return readdirSync(dir)
      .filter((file) => file.endsWith('.md'))
      .map((file) => file.slice(0, -3))
      .sort()
      .map((name) => {
        const content = this.loadPersona(name);
        return {
          name,
          description: extractDescription(content),
          tables: extractTableNames(content),
        };
      });
  }
}

// =============================================================================
// SINGLETON ACCESS
// =============================================================================

let libraryInstance: PersonaLibrary | null = null;

export function getPersonaLibrary(): PersonaLibrary {
  if (!libraryInstance) {
    libraryInstance = new PersonaLibrary(getOrchestratorConfig().promptsDir);
  }
  return libraryInstance;
}
