import { AgentInvocationError } from '../../src/errors/agent-invocation.error';
import { StepExecutor } from '../../src/services/step-executor';
import { AgentReply } from '../../src/services/agent-invoker';
import { FakeDatabase, FakeStepStore, OWNER, ScriptedInvoker, seedWorkflow } from '../helpers/fakes';

describe('StepExecutor', () => {
    let db: FakeDatabase;
    let store: FakeStepStore;
    let invoker: ScriptedInvoker;
    let executor: StepExecutor;

    beforeEach(() => {
        db = new FakeDatabase();
        store = new FakeStepStore(db);
        invoker = new ScriptedInvoker();
        executor = new StepExecutor(invoker);
    });

    it('marks the step running, invokes once and records success', async () => {
        const [step] = await seedWorkflow(db, [{ agentId: 'a1', message: 'hello', stepName: 'greet' }]);
        invoker.on('a1', () => ({ response: 'hi there', toolsUsed: ['lookup', 'format'] }));

        const result = await executor.execute(store, {
            stepId: step.id,
            step,
            enhancedMessage: 'hello + context',
            callerId: OWNER,
        });

        expect(invoker.calls).toHaveLength(1);
        expect(invoker.calls[0]).toMatchObject({ agentId: 'a1', message: 'hello + context', callerId: OWNER });
        expect(invoker.calls[0].conversationId).toBeUndefined();

        expect(result).toMatchObject({
            stepName: 'greet',
            agentId: 'a1',
            message: 'hello + context',
            response: 'hi there',
            toolsUsed: ['lookup', 'format'],
            status: 'success',
        });
        expect(result.error).toBeUndefined();
        expect(result.executionTime).toBeGreaterThanOrEqual(0);

        expect(db.stepLog).toEqual(['greet:running', 'greet:success']);
        expect(db.step('wf-1', 'greet')).toMatchObject({
            status: 'success',
            response: 'hi there',
            tools_used: ['lookup', 'format'],
            message: 'hello',
        });
    });

    it('absorbs agent failures into an error result', async () => {
        const [step] = await seedWorkflow(db, [{ agentId: 'a1', message: 'hello' }]);
        invoker.failFor('a1', 'agent runtime unavailable');

        const result = await executor.execute(store, { stepId: step.id, step, enhancedMessage: 'hello', callerId: OWNER });

        expect(result.status).toBe('error');
        expect(result.error).toBe('agent runtime unavailable');
        expect(result.response).toBe('');
        expect(db.step('wf-1', 'step_1')).toMatchObject({ status: 'error', error_message: 'agent runtime unavailable' });
    });

    it('does not retry a failed invocation', async () => {
        const [step] = await seedWorkflow(db, [{ agentId: 'a1', message: 'hello' }]);
        invoker.failFor('a1', 'boom');

        await executor.execute(store, { stepId: step.id, step, enhancedMessage: 'hello', callerId: OWNER });

        expect(invoker.calls).toHaveLength(1);
    });

    it('records an aborted invocation as an error', async () => {
        const [step] = await seedWorkflow(db, [{ agentId: 'a1', message: 'hello' }]);
        const controller = new AbortController();
        invoker.on('a1', ({ signal }) => new Promise<AgentReply>((_, reject) => {
            signal?.addEventListener('abort', () => reject(new AgentInvocationError('a1', 'call cancelled', true)));
            controller.abort();
        }));

        const result = await executor.execute(store, {
            stepId: step.id,
            step,
            enhancedMessage: 'hello',
            callerId: OWNER,
            signal: controller.signal,
        });

        expect(result.status).toBe('error');
        expect(result.error).toBe('Step aborted: call cancelled');
    });

    it('does not start a step once the run is cancelled', async () => {
        const [step] = await seedWorkflow(db, [{ agentId: 'a1', message: 'hello' }]);
        const controller = new AbortController();
        controller.abort();

        const result = await executor.execute(store, {
            stepId: step.id,
            step,
            enhancedMessage: 'hello',
            callerId: OWNER,
            signal: controller.signal,
        });

        expect(invoker.calls).toHaveLength(0);
        expect(result.status).toBe('error');
        expect(result.error).toBe('Workflow cancelled before step started');
        expect(db.stepLog).toEqual(['step_1:error']);
    });

    it('lets persistence failures propagate', async () => {
        const [step] = await seedWorkflow(db, [{ agentId: 'a1', message: 'hello' }]);
        store.failSaveFor.add('step_1');

        await expect(executor.execute(store, { stepId: step.id, step, enhancedMessage: 'hello', callerId: OWNER }))
            .rejects.toThrow('write failed for step_1');
    });

    it('skip records the unmet dependencies without invoking', async () => {
        const [, step] = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one', stepName: 's1' },
            { agentId: 'a2', message: 'two', stepName: 's2', dependsOn: ['s1'] },
        ]);

        const result = await executor.skip(store, step.id, step, ['s1']);

        expect(invoker.calls).toHaveLength(0);
        expect(result).toMatchObject({ stepName: 's2', status: 'skipped', error: 'Dependencies not met: s1', message: 'two' });
        expect(db.stepLog).toEqual(['s2:skipped']);
    });
});
