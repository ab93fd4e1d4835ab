import { saga, sagaRegistry } from '@sagaloop/sdk';

// Example saga for local dev: CreateWorkflow { workflow_id, saga: "draft-and-review" }
export function registerExampleSagas(): void {
    if (sagaRegistry.get('draft-and-review')) return;

    saga('draft-and-review', [
        {
            name: 'draft',
            forward: { kind: 'reason', instruction: 'Draft a short status update for the team.' },
            compensation: { kind: 'reason', instruction: 'Write a one-line retraction of the draft status update.' },
        },
        {
            name: 'stamp',
            forward: { kind: 'tool', tool: 'current_time', args: {} },
        },
        {
            name: 'review',
            forward: { kind: 'reason', instruction: 'Review the drafted update for clarity and return the final text.' },
        },
    ]);
}
