import {
    KnowledgeStore,
    ReasonAction,
    ToolRegistry,
    TransientProviderError,
    TransientToolError,
    UnrecoverableError,
    terminationReason,
} from '@sagaloop/sdk';
import { ActionOutcome, ReasoningLoop } from '../../src/agent/reasoning-loop';
import { PromptContext } from '../../src/agent/prompt';
import { InMemoryKnowledgeStore } from '../../src/knowledge/in-memory.store';
import { ScriptedModel, instantRetry, quietConsole } from '../helpers/fakes';

const context: PromptContext = { workflowId: 'wf-r', stepName: 'think', phase: 'forward' };
const action = (instruction: string, maxThinkingSteps?: number): ReasonAction =>
    maxThinkingSteps === undefined ? { kind: 'reason', instruction } : { kind: 'reason', instruction, maxThinkingSteps };

function expectOk(outcome: ActionOutcome): unknown {
    if (!outcome.ok) throw new Error(`expected success, got ${outcome.error.message}`);
    return outcome.output;
}

describe('ReasoningLoop', () => {
    let model: ScriptedModel;
    let tools: ToolRegistry;

    beforeEach(() => {
        quietConsole();
        model = new ScriptedModel();
        tools = new ToolRegistry().register('lookup', 'Look a word up', async (args) => ({ word: args.word, meaning: 'a greeting' }));
    });

    it('terminates on a final answer', async () => {
        model.on('Say hi', { kind: 'final', content: 'hi' });
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Say hi'), context, 5);

        expect(expectOk(outcome)).toEqual({
            answer: 'hi', truncated: false, iterations: 1, terminatedBy: terminationReason.FINAL_ANSWER,
        });
        expect(model.requests).toHaveLength(1);
    });

    it('runs tools and feeds the observation back', async () => {
        model.on('Define hello',
            { kind: 'tool_call', tool: 'lookup', args: { word: 'hello' }, thought: 'check the dictionary' },
            { kind: 'final', content: 'hello is a greeting' },
        );
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Define hello'), context, 5);

        expect(expectOk(outcome)).toEqual({
            answer: 'hello is a greeting', truncated: false, iterations: 2, terminatedBy: terminationReason.FINAL_ANSWER,
        });
        expect(outcome.trajectory).toEqual([
            { kind: 'thought', content: 'check the dictionary' },
            { kind: 'tool_call', tool: 'lookup', args: { word: 'hello' } },
            { kind: 'observation', content: '{"word":"hello","meaning":"a greeting"}' },
        ]);
        expect(model.requests[1].messages[3]).toEqual({
            role: 'user',
            content: 'Observation: {"word":"hello","meaning":"a greeting"}',
        });
        expect(model.requests[0].tools).toEqual([{ name: 'lookup', description: 'Look a word up' }]);
    });

    it('tells the model tools are unavailable when use_tools is off', async () => {
        model.on('Define hello',
            { kind: 'tool_call', tool: 'lookup', args: { word: 'hello' } },
            { kind: 'final', content: 'a greeting, probably' },
        );
        const invoke = jest.spyOn(tools, 'invoke');
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, useTools: false, retry: instantRetry });

        const outcome = await loop.run(action('Define hello'), context, 5);

        expect(expectOk(outcome)).toMatchObject({ answer: 'a greeting, probably' });
        expect(invoke).not.toHaveBeenCalled();
        expect(model.requests[0].tools).toEqual([]);
        expect(outcome.trajectory[1]).toEqual({
            kind: 'observation',
            content: 'Tool "lookup" is unavailable: tools are disabled for this agent.',
        });
    });

    it('returns the last thought, truncated, at the step limit', async () => {
        model.on('Ponder', { kind: 'thought', content: 'first idea' }, { kind: 'thought', content: 'better idea' }, { kind: 'final', content: 'never reached' });
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Ponder'), context, 2);

        expect(expectOk(outcome)).toEqual({
            answer: 'better idea', truncated: true, iterations: 2, terminatedBy: terminationReason.STEP_LIMIT_REACHED,
        });
        expect(model.requests).toHaveLength(2);
    });

    it('falls back to the last observation, then to an empty answer', async () => {
        model.on('Look', { kind: 'tool_call', tool: 'lookup', args: { word: 'yo' } });
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });
        expect(expectOk(await loop.run(action('Look'), context, 1))).toMatchObject({
            answer: '{"word":"yo","meaning":"a greeting"}',
            truncated: true,
        });

        const silent = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });
        model.on('Nothing', { kind: 'tool_call', tool: 'lookup', args: {} });
        tools.register('lookup', 'Look a word up', async () => '');
        expect(expectOk(await silent.run(action('Nothing'), context, 1))).toMatchObject({ answer: '', truncated: true });
    });

    it('prefers the action bound over the default', async () => {
        model.on('Ponder', { kind: 'thought', content: 'a' }, { kind: 'thought', content: 'b' }, { kind: 'thought', content: 'c' });
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Ponder', 1), context, 10);

        expect(expectOk(outcome)).toMatchObject({ answer: 'a', iterations: 1 });
        expect(model.requests).toHaveLength(1);
    });

    it('retries transient provider errors without spending iterations', async () => {
        model.on('Say hi', new TransientProviderError('503'), new TransientProviderError('503'), { kind: 'final', content: 'hi' });
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Say hi'), context, 1);

        expect(expectOk(outcome)).toMatchObject({ answer: 'hi', iterations: 1, truncated: false });
        expect(outcome.retries).toBe(2);
    });

    it('fails with UnrecoverableError once the retry budget is exhausted', async () => {
        model.on('Say hi', ...Array.from({ length: 4 }, () => new TransientProviderError('overloaded')));
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Say hi'), context, 5);

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.retries).toBe(3);
        expect(outcome.error).toEqual({
            name: 'RetryExhaustedError',
            code: 'UNRECOVERABLE',
            message: 'model scripted failed after 3 retries: overloaded',
        });
    });

    it('spends no more than the step\'s own retry budget', async () => {
        model.on('Say hi', ...Array.from({ length: 4 }, () => new TransientProviderError('overloaded')));
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Say hi'), context, 5, 1);

        expect(outcome).toMatchObject({
            ok: false,
            retries: 1,
            error: { message: 'model scripted failed after 1 retries: overloaded' },
        });
        expect(model.requests).toHaveLength(2);
    });

    it('fails immediately on a permanent error', async () => {
        model.on('Say hi', new UnrecoverableError('Malformed model response: {"x":1}'));
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Say hi'), context, 5);

        expect(outcome).toMatchObject({
            ok: false,
            retries: 0,
            error: { name: 'UnrecoverableError', message: 'Malformed model response: {"x":1}' },
        });
        expect(model.requests).toHaveLength(1);
    });

    it('retries transient tool errors', async () => {
        let calls = 0;
        tools.register('flaky', 'Sometimes fails', async () => {
            calls++;
            if (calls === 1) throw new TransientToolError('flaky', 'socket hang up');
            return 'fine';
        });
        model.on('Use flaky', { kind: 'tool_call', tool: 'flaky', args: {} }, { kind: 'final', content: 'done' });
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Use flaky'), context, 3);

        expect(expectOk(outcome)).toMatchObject({ answer: 'done' });
        expect(outcome.retries).toBe(1);
        expect(calls).toBe(2);
    });

    it('fails when the model calls an unregistered tool', async () => {
        model.on('Use ghost', { kind: 'tool_call', tool: 'ghost', args: {} });
        const loop = new ReasoningLoop(model, tools, null, { useMemory: false, retry: instantRetry });

        const outcome = await loop.run(action('Use ghost'), context, 3);

        expect(outcome).toMatchObject({ ok: false, error: { name: 'UnrecoverableError' } });
    });

    describe('memory', () => {
        it('adds recalled context to the prompt and stores the answer', async () => {
            const knowledge = new InMemoryKnowledgeStore();
            await knowledge.storeObservation('invoices are due on friday', {});
            model.on('When are invoices due?', { kind: 'final', content: 'Friday' });
            const loop = new ReasoningLoop(model, tools, knowledge, { retry: instantRetry });

            await loop.run(action('When are invoices due?'), context, 3);

            expect(model.requests[0].messages[0].content).toBe(
                'When are invoices due?\n\nRelevant memory:\n- invoices are due on friday'
            );
            expect(await knowledge.fetchContext('invoices', 5)).toEqual([
                'When are invoices due?\nFriday',
                'invoices are due on friday',
            ]);
        });

        it('keeps going when the knowledge store fails', async () => {
            const knowledge: KnowledgeStore = {
                fetchContext: jest.fn().mockRejectedValue(new Error('db down')),
                storeObservation: jest.fn().mockRejectedValue(new Error('db down')),
            };
            model.on('Say hi', { kind: 'final', content: 'hi' });
            const loop = new ReasoningLoop(model, tools, knowledge, { retry: instantRetry });

            const outcome = await loop.run(action('Say hi'), context, 3);

            expect(expectOk(outcome)).toMatchObject({ answer: 'hi' });
            expect(knowledge.storeObservation).toHaveBeenCalledWith('Say hi\nhi', {
                workflowId: 'wf-r', step: 'think', phase: 'forward',
            });
        });

        it('leaves the knowledge store alone when use_memory is off', async () => {
            const knowledge = new InMemoryKnowledgeStore();
            const fetch = jest.spyOn(knowledge, 'fetchContext');
            const loop = new ReasoningLoop(model, tools, knowledge, { useMemory: false, retry: instantRetry });

            await loop.run(action('Say hi'), context, 3);

            expect(fetch).not.toHaveBeenCalled();
            expect(knowledge.size).toBe(0);
        });
    });
});
