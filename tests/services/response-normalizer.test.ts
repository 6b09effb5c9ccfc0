import { describe, it, expect } from 'vitest';
import {
    decodeResponse,
    normalizeResponse,
    stripCodeFences,
} from '../../src/services/recognition/response-normalizer.js';
import { createMockLogger } from '../mocks/index.js';

describe('Response normalization', () => {
    describe('decodeResponse', () => {
        it('should take a plain string as is', () => {
            expect(decodeResponse('  Hello  ')).toEqual({ shape: 'string', text: '  Hello  ' });
        });

        it('should read a content field', () => {
            expect(decodeResponse({ content: 'From content', text: 'ignored' }))
                .toEqual({ shape: 'content', text: 'From content' });
        });

        it('should read a text field', () => {
            expect(decodeResponse({ text: 'From text' })).toEqual({ shape: 'text', text: 'From text' });
        });

        it('should read the first choice message', () => {
            const response = {
                choices: [
                    { message: { content: 'Hello' } },
                    { message: { content: 'Second' } },
                ],
            };
            expect(decodeResponse(response)).toEqual({ shape: 'choice-message', text: 'Hello' });
        });

        it('should fall back to the first choice text', () => {
            expect(decodeResponse({ choices: [{ message: { content: null }, text: 'Legacy' }] }))
                .toEqual({ shape: 'choice-text', text: 'Legacy' });
        });

        it('should stringify an unreadable first choice', () => {
            expect(decodeResponse({ choices: [{ index: 0 }] }))
                .toEqual({ shape: 'choice-unknown', text: '{"index":0}' });
        });

        it('should stringify unknown shapes', () => {
            expect(decodeResponse({ output: 1 })).toEqual({ shape: 'unknown', text: '{"output":1}' });
            expect(decodeResponse(42)).toEqual({ shape: 'unknown', text: '42' });
            expect(decodeResponse(null)).toEqual({ shape: 'unknown', text: 'null' });
            expect(decodeResponse({ choices: [] })).toEqual({ shape: 'unknown', text: '{"choices":[]}' });
        });
    });

    describe('stripCodeFences', () => {
        it('should strip a text fence', () => {
            expect(stripCodeFences('```text\nHello\n```')).toBe('Hello');
        });

        it('should strip a bare fence', () => {
            expect(stripCodeFences('```\nLine one\nLine two\n```')).toBe('Line one\nLine two');
        });

        it('should strip a fence missing its end', () => {
            expect(stripCodeFences('  ```text\nHello')).toBe('Hello');
        });

        it('should trim unfenced text', () => {
            expect(stripCodeFences('\n  Plain text \n')).toBe('Plain text');
        });

        it('should keep fences inside the text', () => {
            expect(stripCodeFences('Before\n```\ncode\n```\nAfter')).toBe('Before\n```\ncode\n```\nAfter');
        });
    });

    describe('normalizeResponse', () => {
        it('should decode and clean a chat completion', () => {
            const logger = createMockLogger();
            const response = { choices: [{ message: { content: '```text\nHello\n```' } }] };

            expect(normalizeResponse(response, logger)).toEqual({ shape: 'choice-message', text: 'Hello' });
            expect(logger.warn).not.toHaveBeenCalled();
        });

        it('should warn about unknown shapes', () => {
            const logger = createMockLogger();

            expect(normalizeResponse({ data: 'x' }, logger, { pageNumber: 4 }).text).toBe('{"data":"x"}');
            expect(logger.warn).toHaveBeenCalledWith(
                'Unrecognized recognition response shape, using its string form',
                { pageNumber: 4, shape: 'unknown' }
            );
        });
    });
});
