import { WorkflowSummary } from '../src/types';
import {
    MalformedMessageError,
    parseSummaryMessage,
    readStringMap,
    toHeaderMessage,
    toSummaryMessage,
} from '../src/wire';

const summary: WorkflowSummary = {
    workflowId: 'wf-1',
    workflowName: 'Digest',
    conversationId: 'workflow_wf-1',
    totalExecutionTime: 1.5,
    status: 'partial_success',
    timestamp: '2024-05-01T10:00:00.000Z',
    steps: [
        {
            stepName: 'collect',
            agentId: 'a1',
            message: 'collect',
            response: 'done',
            toolsUsed: ['search'],
            executionTime: 1.2,
            status: 'success',
            timestamp: '2024-05-01T10:00:01.000Z',
        },
        {
            stepName: 'write',
            agentId: 'a2',
            message: 'write',
            response: '',
            toolsUsed: [],
            executionTime: 0.3,
            status: 'error',
            error: 'agent unavailable',
            timestamp: '2024-05-01T10:00:02.000Z',
        },
    ],
};

describe('wire messages', () => {
    test('summary messages use snake_case and empty strings for absent errors', () => {
        const message = toSummaryMessage(summary);
        expect(message.workflow_id).toBe('wf-1');
        expect(message.steps[0]).toEqual({
            step_name: 'collect',
            agent_id: 'a1',
            message: 'collect',
            response: 'done',
            tools_used: ['search'],
            execution_time: 1.2,
            status: 'success',
            error: '',
            timestamp: '2024-05-01T10:00:01.000Z',
        });
    });

    test('parsing restores the absent error as undefined', () => {
        const parsed = parseSummaryMessage(toSummaryMessage(summary));
        expect(parsed.steps[0].error).toBeUndefined();
        expect(parsed.steps[1].error).toBe('agent unavailable');
        expect(parsed.status).toBe('partial_success');
    });

    test('unknown statuses are rejected', () => {
        const message = { ...toSummaryMessage(summary), status: 'exploded' };
        expect(() => parseSummaryMessage(message)).toThrow(MalformedMessageError);
        expect(() => parseSummaryMessage(message)).toThrow('unknown workflow status "exploded"');
    });

    test('wrong field types are rejected', () => {
        expect(() => parseSummaryMessage({ workflow_id: 7 })).toThrow('workflow_id is not a string');
    });

    test('headers send 0 for a workflow that has no total time yet', () => {
        expect(toHeaderMessage({
            workflowId: 'wf-2',
            name: 'Running',
            status: 'running',
            totalExecutionTime: null,
            stepCount: 2,
            createdAt: '2024-05-01T10:00:00.000Z',
            conversationId: 'workflow_wf-2',
        }).total_execution_time).toBe(0);
    });

    test('string maps are narrowed entry by entry', () => {
        expect(readStringMap({ params: { a: '1' } }, 'params')).toEqual({ a: '1' });
        expect(() => readStringMap({ params: { a: 1 } }, 'params')).toThrow('params.a is not a string');
    });
});
