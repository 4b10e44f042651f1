import { OrchestrationError } from '../../src/errors/orchestration.error';
import { LevelParallelScheduler } from '../../src/services/parallel-scheduler';
import { SequentialScheduler } from '../../src/services/sequential-scheduler';
import { StepExecutor } from '../../src/services/step-executor';
import {
    FakeDatabase,
    FakeStepSessions,
    FakeStepStore,
    OWNER,
    ScriptedInvoker,
    seedWorkflow,
} from '../helpers/fakes';
import { sleep } from '../helpers/poll';

const ctx = { workflowId: 'wf-1', callerId: OWNER };

describe('SequentialScheduler', () => {
    let db: FakeDatabase;
    let invoker: ScriptedInvoker;
    let scheduler: SequentialScheduler;

    beforeEach(() => {
        db = new FakeDatabase();
        invoker = new ScriptedInvoker();
        scheduler = new SequentialScheduler(new StepExecutor(invoker), new FakeStepStore(db));
    });

    it('runs a linear chain in order and passes each response forward', async () => {
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'first', stepName: 's1' },
            { agentId: 'a2', message: 'second', stepName: 's2', dependsOn: ['s1'] },
            { agentId: 'a3', message: 'third', stepName: 's3', dependsOn: ['s2'] },
        ]);
        invoker.on('a1', () => ({ response: 'R1', toolsUsed: [] }));
        invoker.on('a2', () => ({ response: 'R2', toolsUsed: [] }));

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => r.stepName)).toEqual(['s1', 's2', 's3']);
        expect(results.every(r => r.status === 'success')).toBe(true);
        expect(invoker.messageFor('a2')).toContain('R1');
        expect(invoker.messageFor('a3')).toContain('R2');
        expect(invoker.messageFor('a3')).not.toContain('R1');
    });

    it('never starts a step before the previous one is recorded', async () => {
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one' },
            { agentId: 'a2', message: 'two' },
        ]);

        await scheduler.run(steps, ctx);

        expect(db.stepLog).toEqual(['step_1:running', 'step_1:success', 'step_2:running', 'step_2:success']);
        expect(invoker.maxInFlight).toBe(1);
    });

    it('skips a step whose dependency errored', async () => {
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'first', stepName: 's1' },
            { agentId: 'a2', message: 'second', stepName: 's2', dependsOn: ['s1'] },
        ]);
        invoker.failFor('a1', 'upstream down');

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => r.status)).toEqual(['error', 'skipped']);
        expect(results[1].error).toBe('Dependencies not met: s1');
        expect(invoker.calls.map(c => c.agentId)).toEqual(['a1']);
    });

    it('skips transitively and keeps running independent steps', async () => {
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one', stepName: 's1' },
            { agentId: 'a2', message: 'two', stepName: 's2', dependsOn: ['s1'] },
            { agentId: 'a3', message: 'three', stepName: 's3', dependsOn: ['s2'] },
            { agentId: 'a4', message: 'four', stepName: 's4' },
        ]);
        invoker.failFor('a1', 'nope');

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => `${r.stepName}:${r.status}`)).toEqual(['s1:error', 's2:skipped', 's3:skipped', 's4:success']);
        expect(results[2].error).toBe('Dependencies not met: s2');
    });

    it('skips a step that depends on a later one', async () => {
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one', stepName: 'early', dependsOn: ['late'] },
            { agentId: 'a2', message: 'two', stepName: 'late' },
        ]);

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => r.status)).toEqual(['skipped', 'success']);
        expect(results[0].error).toBe('Dependencies not met: late');
    });

    it('lists every unmet dependency', async () => {
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one', stepName: 's1' },
            { agentId: 'a2', message: 'two', stepName: 's2' },
            { agentId: 'a3', message: 'three', stepName: 's3', dependsOn: ['s1', 's2'] },
        ]);
        invoker.failFor('a1', 'x').failFor('a2', 'y');

        const results = await scheduler.run(steps, ctx);

        expect(results[2].error).toBe('Dependencies not met: s1, s2');
    });

    it('records remaining steps as errors after cancellation', async () => {
        const controller = new AbortController();
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one' },
            { agentId: 'a2', message: 'two' },
        ]);
        invoker.on('a1', () => {
            controller.abort();
            return { response: 'done', toolsUsed: [] };
        });

        const results = await scheduler.run(steps, { ...ctx, signal: controller.signal });

        expect(results.map(r => r.status)).toEqual(['success', 'error']);
        expect(results[1].error).toBe('Workflow cancelled before step started');
        expect(invoker.calls).toHaveLength(1);
    });
});

describe('LevelParallelScheduler', () => {
    let db: FakeDatabase;

    beforeEach(() => {
        db = new FakeDatabase();
    });

    it('runs independent steps concurrently', async () => {
        const invoker = new ScriptedInvoker(40);
        const sessions = new FakeStepSessions(db);
        const scheduler = new LevelParallelScheduler(new StepExecutor(invoker), sessions);
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one' },
            { agentId: 'a2', message: 'two' },
            { agentId: 'a3', message: 'three' },
        ]);

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => r.status)).toEqual(['success', 'success', 'success']);
        expect(invoker.maxInFlight).toBe(3);
    });

    it('gives every step its own session and releases all of them', async () => {
        const sessions = new FakeStepSessions(db);
        const scheduler = new LevelParallelScheduler(new StepExecutor(new ScriptedInvoker(10)), sessions);
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one' },
            { agentId: 'a2', message: 'two' },
        ]);

        await scheduler.run(steps, ctx);

        expect(sessions.opened).toBe(2);
        expect(sessions.released).toBe(2);
        expect(sessions.maxOpen).toBe(2);
        expect(new Set(sessions.stores).size).toBe(2);
    });

    it('runs a level wider than the session pool within its concurrency limit', async () => {
        const invoker = new ScriptedInvoker(5);
        const sessions = new FakeStepSessions(db, [], 4);
        const scheduler = new LevelParallelScheduler(new StepExecutor(invoker), sessions, 4);
        const steps = await seedWorkflow(db, Array.from({ length: 25 }, (_, i) => ({
            agentId: `a${i + 1}`,
            message: `task ${i + 1}`,
        })));

        const results = await scheduler.run(steps, ctx);

        expect(results).toHaveLength(25);
        expect(results.every(r => r.status === 'success')).toBe(true);
        expect(results[24].stepName).toBe('step_25');
        expect(sessions.maxOpen).toBe(4);
        expect(sessions.released).toBe(25);
        expect(invoker.maxInFlight).toBe(4);
        expect(db.stepsOf('wf-1').every(row => row.status === 'success')).toBe(true);
    });

    it('keeps result order when lanes finish out of order', async () => {
        const invoker = new ScriptedInvoker();
        invoker.on('slow', async ({ message }) => {
            await sleep(30);
            return { response: `slow saw: ${message}`, toolsUsed: [] };
        });
        const scheduler = new LevelParallelScheduler(new StepExecutor(invoker), new FakeStepSessions(db), 2);
        const steps = await seedWorkflow(db, [
            { agentId: 'slow', message: 'one' },
            { agentId: 'fast', message: 'two' },
            { agentId: 'fast', message: 'three' },
        ]);

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => r.response)).toEqual(['slow saw: one', 'fast saw: two', 'fast saw: three']);
    });

    it('rejects a non-positive concurrency', () => {
        expect(() => new LevelParallelScheduler(new StepExecutor(new ScriptedInvoker()), new FakeStepSessions(db), 0))
            .toThrow('step concurrency must be a positive integer, got 0');
    });

    it('starts a level only after the previous level is recorded', async () => {
        const invoker = new ScriptedInvoker(5);
        const scheduler = new LevelParallelScheduler(new StepExecutor(invoker), new FakeStepSessions(db));
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'root', stepName: 'root' },
            { agentId: 'a2', message: 'left', stepName: 'left', dependsOn: ['root'] },
            { agentId: 'a3', message: 'right', stepName: 'right', dependsOn: ['root'] },
            { agentId: 'a4', message: 'join', stepName: 'join', dependsOn: ['left', 'right'] },
        ]);
        invoker.on('a1', () => ({ response: 'ROOT', toolsUsed: [] }));

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => r.stepName)).toEqual(['root', 'left', 'right', 'join']);
        const log = db.stepLog;
        expect(log.indexOf('root:success')).toBeLessThan(log.indexOf('left:running'));
        expect(log.indexOf('left:success')).toBeLessThan(log.indexOf('join:running'));
        expect(log.indexOf('right:success')).toBeLessThan(log.indexOf('join:running'));
        expect(invoker.messageFor('a2')).toContain('ROOT');
        expect(invoker.messageFor('a4')).toContain('--- Context from left ---');
        expect(invoker.messageFor('a4')).toContain('--- Context from right ---');
    });

    it('runs dependents of failed steps with a warning instead of skipping', async () => {
        const invoker = new ScriptedInvoker().failFor('a1', 'broken');
        const scheduler = new LevelParallelScheduler(new StepExecutor(invoker), new FakeStepSessions(db));
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'first', stepName: 's1' },
            { agentId: 'a2', message: 'second', stepName: 's2', dependsOn: ['s1'] },
        ]);

        const results = await scheduler.run(steps, ctx);

        expect(results.map(r => r.status)).toEqual(['error', 'success']);
        expect(invoker.messageFor('a2')).toBe('second\n\n[Warning] s1 did not succeed (status: error)');
    });

    it('turns an unschedulable graph into an OrchestrationError', async () => {
        const scheduler = new LevelParallelScheduler(new StepExecutor(new ScriptedInvoker()), new FakeStepSessions(db));
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one', stepName: 'a', dependsOn: ['b'] },
            { agentId: 'a2', message: 'two', stepName: 'b', dependsOn: ['a'] },
        ]);

        await expect(scheduler.run(steps, ctx)).rejects.toThrow(OrchestrationError);
        await expect(scheduler.run(steps, ctx)).rejects.toThrow('Cannot schedule steps with unresolved dependencies: a, b');
    });

    it('fails the run when a step outcome cannot be stored', async () => {
        const sessions = new FakeStepSessions(db, ['s2']);
        const scheduler = new LevelParallelScheduler(new StepExecutor(new ScriptedInvoker()), sessions);
        const steps = await seedWorkflow(db, [
            { agentId: 'a1', message: 'one', stepName: 's1' },
            { agentId: 'a2', message: 'two', stepName: 's2' },
        ]);

        await expect(scheduler.run(steps, ctx)).rejects.toThrow('Step s2 could not be recorded');
        expect(sessions.released).toBe(2);
    });
});
