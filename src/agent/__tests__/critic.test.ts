import { describe, it, expect } from 'vitest';
import { Critic, formatDiagnostics } from '../critic.js';
import { ScriptedCompletion, loadTestCatalog } from './fixtures.js';

const catalog = loadTestCatalog();

describe('Critic', () => {
  describe('formatDiagnostics', () => {
    it('should note when nothing was recorded', () => {
      expect(formatDiagnostics([])).toBe('- (no diagnostics recorded)');
    });

    it('should include position, fragment and detail', () => {
      expect(
        formatDiagnostics([
          {
            code: 'SYNTAX_VALIDATION_ERROR',
            message: 'Bad syntax',
            line: 1,
            column: 8,
            fragment: 'FROM',
            detail: 'Expected a column',
          },
          { code: 'EXECUTION_ERROR', message: 'Query failed', line: 2 },
        ])
      ).toBe('- [SYNTAX_VALIDATION_ERROR] at line 1, column 8 near "FROM" Bad syntax: Expected a column\n- [EXECUTION_ERROR] at line 2 Query failed');
    });
  });

  describe('critique', () => {
    it('should return the trimmed rationale', async () => {
      const completion = new ScriptedCompletion({ critique: ['  customer has no nickname column; use first_name.  '] });
      const rationale = await new Critic(completion).critique({
        question: 'list customer nicknames',
        sql: 'SELECT nickname FROM customer',
        diagnostics: [{ code: 'UNKNOWN_IDENTIFIER', message: 'Unknown column' }],
        catalog,
        matchedTables: ['customer'],
      });

      expect(rationale).toBe('customer has no nickname column; use first_name.');
      const [call] = completion.calls;
      expect(call.userPrompt).toContain('Failed SQL:\nSELECT nickname FROM customer');
      expect(call.userPrompt).toContain('- [UNKNOWN_IDENTIFIER] Unknown column');
      expect(call.context).toContain('Table: customer');
    });

    it('should say when no SQL was produced', async () => {
      const completion = new ScriptedCompletion({ critique: ['Join through invoice.'] });
      await new Critic(completion).critique({ question: 'q', sql: null, diagnostics: [], catalog, matchedTables: [] });
      expect(completion.calls[0].userPrompt).toContain('Failed SQL:\n(no SQL was produced)');
    });

    it('should propagate completion failures', async () => {
      const completion = new ScriptedCompletion({ critique: [new Error('service down')] });
      await expect(
        new Critic(completion).critique({ question: 'q', sql: null, diagnostics: [], catalog, matchedTables: [] })
      ).rejects.toThrow('service down');
    });
  });
});
