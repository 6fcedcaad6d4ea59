import type { Message, Task, TaskView } from '@pacer/core';
import { TaskStatus } from '@pacer/core';

/**
 * In-memory task registry.
 *
 * Owned by one dispatcher and constructed at process start. Node runs each
 * mutation to completion, so a create or update is atomic with respect to
 * concurrent reads of the same id. Entries live for the life of the process.
 */
export class TaskStore {
    private tasks = new Map<string, Task>();

    /**
     * Snapshot of a task, or undefined when the id is unknown.
     */
    get(taskId: string): Task | undefined {
        const task = this.tasks.get(taskId);
        return task ? { ...task } : undefined;
    }

    /**
     * Register a new task in `pending`. Returns undefined when the id is taken.
     */
    create(taskId: string, message: Message): Task | undefined {
        if (this.tasks.has(taskId)) {
            return undefined;
        }
        const task: Task = { id: taskId, message, status: TaskStatus.PENDING };
        this.tasks.set(taskId, task);
        return { ...task };
    }

    /**
     * pending -> working
     */
    markWorking(taskId: string): Task | undefined {
        return this.update(taskId, (task) =>
            task.status === TaskStatus.PENDING ? { ...task, status: TaskStatus.WORKING } : task
        );
    }

    /**
     * Record the capability result.
     *
     * A task canceled while its capability was still running is overwritten
     * here: cancellation is bookkeeping only and does not stop the work.
     */
    complete(taskId: string, result: Message): Task | undefined {
        return this.update(taskId, (task) =>
            isSettledByCapability(task.status)
                ? task
                : { ...task, status: TaskStatus.COMPLETED, result }
        );
    }

    fail(taskId: string): Task | undefined {
        return this.update(taskId, (task) =>
            isSettledByCapability(task.status) ? task : { ...task, status: TaskStatus.FAILED }
        );
    }

    /**
     * Move a pending or working task to `canceled`. Completed and failed tasks
     * keep their status.
     */
    cancel(taskId: string): Task | undefined {
        return this.update(taskId, (task) =>
            task.status === TaskStatus.PENDING || task.status === TaskStatus.WORKING
                ? { ...task, status: TaskStatus.CANCELED }
                : task
        );
    }

    get size(): number {
        return this.tasks.size;
    }

    private update(taskId: string, transition: (task: Task) => Task): Task | undefined {
        const current = this.tasks.get(taskId);
        if (!current) {
            return undefined;
        }
        const next = transition(current);
        this.tasks.set(taskId, next);
        return { ...next };
    }
}

function isSettledByCapability(status: TaskStatus): boolean {
    return status === TaskStatus.COMPLETED || status === TaskStatus.FAILED;
}

export function toTaskView(task: Task): TaskView {
    return {
        taskId: task.id,
        status: task.status,
        ...(task.result !== undefined && { result: task.result }),
    };
}
