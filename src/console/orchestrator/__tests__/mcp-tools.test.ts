/**
 * Jest Unit Tests for the MCP tool renderers
 */

import type { ResponseEnvelope } from '../../../common/types.js';
import { formatEnvelope } from '../tools/ask-tool.js';
import { formatRegistry } from '../tools/registry-tool.js';
import { createToolRegistry } from '../tool-registry.js';
import { createCompetitorMappingTool } from '../direct-tools/competitor-mapping.js';
import { classificationFor, FakeStore } from './fixtures.js';

describe('formatEnvelope', () => {
  const envelope: ResponseEnvelope = {
    requestId: 'req-1',
    question: 'Replace BR-56U10 with our equivalent',
    classification: classificationFor('sales_rep'),
    executionPath: 'ai_workflow_fallback',
    stageResults: {
      evaluation: {
        businessAnswer: 'Use PK-100',
        keyFindings: [],
        recommendedAction: '',
        confidenceLabel: 'medium',
        dataQualityNote: '',
        parseMode: 'unstructured_fallback',
      },
    },
    finalAnswer: '**Use PK-100**',
    degraded: true,
    notes: ['The fallback query failed (timeout); the answer may be incomplete'],
    timing: { totalMs: 42, storeQueries: 1 },
  };

  test('renders answer, execution details and notes', () => {
    expect(formatEnvelope(envelope).split('\n')).toEqual([
      '**Use PK-100**',
      '',
      '---',
      '',
      '## Execution',
      '- **Path:** ai_workflow_fallback',
      '- **Persona:** sales_rep (test_intent, confidence 0.90)',
      '- **Stages:** evaluation',
      '- **Store queries:** 1',
      '- **Duration:** 42ms',
      '- **Confidence:** medium (unstructured_fallback)',
      '- **Degraded:** yes',
      '',
      '## Notes',
      '- The fallback query failed (timeout); the answer may be incomplete',
      '',
      '*Request: req-1*',
    ]);
  });

  test('omits the notes section when there are none', () => {
    const text = formatEnvelope({ ...envelope, degraded: false, notes: [] });
    expect(text).not.toContain('## Notes');
    expect(text).not.toContain('**Degraded:**');
  });
});

describe('formatRegistry', () => {
  const registry = createToolRegistry([createCompetitorMappingTool(new FakeStore())]);

  test('lists tools with their example triggers', () => {
    const lines = formatRegistry(registry).split('\n');
    expect(lines.slice(0, 6)).toEqual([
      '# Direct Tools',
      '',
      '1 tools across 1 personas',
      '',
      '## sales_rep',
      '1. **competitor_mapping**: Direct competitor product mapping to our equivalent products',
    ]);
    expect(lines).toContain('   - "Replace BR-56U10 with our equivalent"');
  });

  test('reports a persona without tools', () => {
    expect(formatRegistry(registry, 'quality_engineer').split('\n').slice(-2)).toEqual([
      '## quality_engineer',
      'No direct tools registered.',
    ]);
  });
});
