import { StepResult, StepStatus } from '@agentchain/sdk';
import { enhanceMessage } from '../../src/services/dependency-context';

function result(stepName: string, status: StepStatus, response = ''): StepResult {
    return {
        stepName,
        agentId: 'a1',
        message: 'm',
        response,
        toolsUsed: [],
        executionTime: 0,
        status,
        timestamp: '2024-05-01T10:00:00.000Z',
    };
}

describe('enhanceMessage', () => {
    it('leaves messages without dependencies untouched', () => {
        expect(enhanceMessage('hello', [], new Map())).toBe('hello');
    });

    it('appends successful responses as delimited context', () => {
        const results = new Map([['fetch', result('fetch', 'success', 'three repos')]]);

        expect(enhanceMessage('summarise', ['fetch'], results)).toBe(
            'summarise\n\n--- Context from fetch ---\nthree repos\n--- End of context from fetch ---',
        );
    });

    it('warns about dependencies that did not succeed', () => {
        const results = new Map([['fetch', result('fetch', 'error')]]);

        expect(enhanceMessage('summarise', ['fetch'], results)).toBe(
            'summarise\n\n[Warning] fetch did not succeed (status: error)',
        );
    });

    it('follows dependsOn order, not result order', () => {
        const results = new Map([
            ['b', result('b', 'skipped')],
            ['a', result('a', 'success', 'A')],
        ]);

        expect(enhanceMessage('go', ['a', 'b'], results)).toBe(
            'go\n\n--- Context from a ---\nA\n--- End of context from a ---'
            + '\n\n[Warning] b did not succeed (status: skipped)',
        );
    });

    it('ignores dependencies with no result', () => {
        expect(enhanceMessage('go', ['later'], new Map())).toBe('go');
    });
});
