import { describe, it, expect } from 'vitest';
import { SQLWriter, extractSql, isSqlShaped } from '../sqlWriter.js';
import type { Intent } from '../../types.js';
import { ScriptedCompletion, loadTestCatalog } from './fixtures.js';

const catalog = loadTestCatalog();
const intent: Intent = { questionType: 'list', rowLimit: 5, timeRange: null, defaulted: false };

describe('SQL Writer', () => {
  describe('extractSql', () => {
    it('should take the body of the first code fence', () => {
      expect(extractSql('Here you go:\n```sql\nSELECT 1;\n```\nThanks')).toBe('SELECT 1');
    });

    it('should strip trailing semicolons from bare SQL', () => {
      expect(extractSql('  SELECT a FROM b;; ')).toBe('SELECT a FROM b');
    });
  });

  describe('isSqlShaped', () => {
    it('should recognise SQL with or without a fence', () => {
      expect(isSqlShaped('```sql\nWITH x AS (SELECT 1) SELECT * FROM x\n```')).toBe(true);
      expect(isSqlShaped('(SELECT 1)')).toBe(true);
    });

    it('should treat write statements as SQL', () => {
      expect(isSqlShaped('DROP TABLE customer')).toBe(true);
    });

    it('should treat conversation as chat', () => {
      expect(isSqlShaped('Hello! I can answer questions about the music store.')).toBe(false);
      expect(isSqlShaped('Selecting the right table is hard')).toBe(false);
    });
  });

  describe('generate', () => {
    it('should return SQL from a fenced reply', async () => {
      const completion = new ScriptedCompletion({ generate: ['```sql\nSELECT email FROM customer LIMIT 5;\n```'] });
      const outcome = await new SQLWriter(completion).generate({
        question: '查询前5个客户的邮箱',
        intent,
        catalog,
        matchedTables: ['customer'],
        history: '',
      });

      expect(outcome).toEqual({ kind: 'sql', sql: 'SELECT email FROM customer LIMIT 5' });
      const [call] = completion.calls;
      expect(call.systemPrompt).toContain('Generate a PostgreSQL SELECT query');
      expect(call.userPrompt).toBe('User Question: 查询前5个客户的邮箱\nIntent: type: list; return at most 5 rows (use LIMIT 5)');
      expect(call.context).toContain('Table: customer');
      expect(call.context).not.toContain('Table: genre');
    });

    it('should return chat text for a conversational reply', async () => {
      const completion = new ScriptedCompletion({ generate: ['  Hi there! Ask me about customers or tracks.  '] });
      const outcome = await new SQLWriter(completion).generate({
        question: 'hello',
        intent: { ...intent, questionType: 'lookup', rowLimit: null, defaulted: true },
        catalog,
        matchedTables: [],
        history: '',
      });
      expect(outcome).toEqual({ kind: 'chat', text: 'Hi there! Ask me about customers or tracks.' });
    });

    it('should put the failed attempt and join hint into a repair prompt', async () => {
      const completion = new ScriptedCompletion({ generate: ['SELECT email FROM customer'] });
      await new SQLWriter(completion, 'MySQL').generate({
        question: 'list customer nicknames',
        intent,
        catalog,
        matchedTables: ['customer'],
        joinHint: 'FROM customer',
        history: 'Recent Conversation History:\n[turn 1] User: hi',
        repair: {
          previousSql: 'SELECT nickname FROM customer',
          diagnostics: [{ code: 'UNKNOWN_IDENTIFIER', message: 'Unknown column', detail: 'nickname' }],
          critique: 'Use email instead.',
        },
      });

      const [call] = completion.calls;
      expect(call.systemPrompt).toContain('Generate a MySQL SELECT query');
      expect(call.userPrompt).toContain('Previous SQL:\nSELECT nickname FROM customer');
      expect(call.userPrompt).toContain('- [UNKNOWN_IDENTIFIER] Unknown column: nickname');
      expect(call.userPrompt).toContain('Reviewer notes:\nUse email instead.');
      expect(call.context).toContain('Join Path (use these joins):\nFROM customer');
      expect(call.context).toContain('[turn 1] User: hi');
    });

    it('should propagate completion failures', async () => {
      const completion = new ScriptedCompletion({ generate: [new Error('quota exceeded')] });
      await expect(
        new SQLWriter(completion).generate({ question: 'q', intent, catalog, matchedTables: [], history: '' })
      ).rejects.toThrow('quota exceeded');
    });
  });
});
