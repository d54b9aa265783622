/**
 * Parameter shape checks
 */

import { describe, it, expect } from 'vitest';
import { checkParameterShape, clamp, requireTextMessages } from '../../src/providers/parameters.js';
import { ValidationError } from '../../src/core/errors.js';

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.field;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('checkParameterShape', () => {
  it('should turn a prompt into a single user message', () => {
    const prepared = checkParameterShape({ prompt: 'Hello' });

    expect(prepared.messages).toEqual([{ role: 'user', content: 'Hello' }]);
    expect(prepared.extra).toEqual({});
  });

  it('should prefer messages when both are given', () => {
    const prepared = checkParameterShape({
      prompt: 'ignored',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi' },
      ],
    });

    expect(prepared.messages.map((message) => message.role)).toEqual(['system', 'user']);
  });

  it('should require prompt or messages', () => {
    expect(fieldOf(() => checkParameterShape({ temperature: 0.5 }))).toBe('parameters');
  });

  it('should reject a non-string prompt', () => {
    expect(fieldOf(() => checkParameterShape({ prompt: 42 }))).toBe('prompt');
  });

  it('should reject empty or malformed message lists', () => {
    expect(fieldOf(() => checkParameterShape({ messages: [] }))).toBe('messages');
    expect(fieldOf(() => checkParameterShape({ messages: [{ role: 'tool', content: 'x' }] }))).toBe('messages');
    expect(fieldOf(() => checkParameterShape({ messages: [{ role: 'user', content: 1 }] }))).toBe('messages');
    expect(fieldOf(() => checkParameterShape({ messages: [{ role: 'user', content: [] }] }))).toBe('messages');
    expect(fieldOf(() => checkParameterShape({ messages: [{ role: 'user', content: ['text'] }] }))).toBe('messages');
    expect(() => checkParameterShape({ messages: [{ role: 'user', content: 'ok' }, 'nope'] })).toThrow(
      'messages[1] must be {role, content}'
    );
  });

  it('should keep a list of content parts as supplied', () => {
    const content = [{ image: 'https://img.test/cat.png' }, { text: 'What is this?' }];

    const prepared = checkParameterShape({ messages: [{ role: 'user', content }] });

    expect(prepared.messages).toEqual([{ role: 'user', content }]);
  });

  it('should validate max_tokens as a positive integer', () => {
    expect(fieldOf(() => checkParameterShape({ prompt: 'x', max_tokens: 0 }))).toBe('max_tokens');
    expect(fieldOf(() => checkParameterShape({ prompt: 'x', max_tokens: 1.5 }))).toBe('max_tokens');
    expect(fieldOf(() => checkParameterShape({ prompt: 'x', max_tokens: '10' }))).toBe('max_tokens');
    expect(checkParameterShape({ prompt: 'x', max_tokens: 10 }).max_tokens).toBe(10);
  });

  it('should validate sampling parameters as numbers', () => {
    expect(fieldOf(() => checkParameterShape({ prompt: 'x', temperature: 'hot' }))).toBe('temperature');
    expect(fieldOf(() => checkParameterShape({ prompt: 'x', top_p: Number.NaN }))).toBe('top_p');
  });

  it('should pass unrecognised keys through in extra', () => {
    const prepared = checkParameterShape({ prompt: 'x', top_k: 40, seed: 7, temperature: 0.2 });

    expect(prepared.extra).toEqual({ top_k: 40, seed: 7 });
    expect(prepared.temperature).toBe(0.2);
  });
});

describe('requireTextMessages', () => {
  it('should pass plain-text messages', () => {
    expect(requireTextMessages([{ role: 'user', content: 'Hi' }], 'gemini')).toEqual([{ role: 'user', content: 'Hi' }]);
  });

  it('should name the provider and the message holding content parts', () => {
    const messages = [
      { role: 'system' as const, content: 'Be brief' },
      { role: 'user' as const, content: [{ text: 'Hi' }] },
    ];

    expect(() => requireTextMessages(messages, 'gemini')).toThrow(
      'gemini accepts text content only; messages[1].content must be a string'
    );
    expect(fieldOf(() => requireTextMessages(messages, 'gemini'))).toBe('messages');
  });
});

describe('clamp', () => {
  it('should bound values on both sides', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-1, 0, 1)).toBe(0);
    expect(clamp(0.4, 0, 1)).toBe(0.4);
  });
});
