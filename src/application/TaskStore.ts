import { v4 as uuidv4 } from 'uuid';
import {
    VideoTask,
    VideoTaskInput,
    VideoTaskStage,
    createVideoTask,
    advanceTaskStage,
    failTask,
    isTaskTerminal,
} from '../domain/entities/VideoTask';
import { TaskNotFoundError } from '../domain/errors/PipelineErrors';

/**
 * In-memory registry of video tasks for one process.
 * Tasks do not survive a restart; finished tasks can be evicted.
 */
export class TaskStore {
    private tasks: Map<string, VideoTask> = new Map();

    /**
     * Creates a new task in the `preparing` stage.
     */
    createTask(input: VideoTaskInput): VideoTask {
        const id = `task_${uuidv4()}`;
        const task = createVideoTask(id, input);
        this.tasks.set(id, task);
        return task;
    }

    /**
     * Gets a task by ID.
     */
    getTask(id: string): VideoTask | null {
        return this.tasks.get(id) || null;
    }

    /**
     * Gets a task by ID or throws TaskNotFoundError.
     */
    requireTask(id: string): VideoTask {
        const task = this.tasks.get(id);
        if (!task) {
            throw new TaskNotFoundError(id);
        }
        return task;
    }

    /**
     * Moves a task to a later stage.
     */
    advanceStage(id: string, stage: VideoTaskStage, progressMessage?: string): VideoTask {
        const updated = advanceTaskStage(this.requireTask(id), stage, progressMessage);
        this.tasks.set(id, updated);
        return updated;
    }

    /**
     * Applies a domain transition to a task and stores the result.
     */
    updateTask(id: string, transition: (task: VideoTask) => VideoTask): VideoTask {
        const updated = transition(this.requireTask(id));
        if (updated.id !== id) {
            throw new Error(`Task transition changed id ${id} to ${updated.id}`);
        }
        this.tasks.set(id, updated);
        return updated;
    }

    /**
     * Marks a task as failed. Already-terminal tasks are returned unchanged.
     */
    failTask(id: string, error: string, progressMessage?: string): VideoTask {
        const task = this.requireTask(id);
        if (isTaskTerminal(task)) {
            return task;
        }
        const failed = failTask(task, error, progressMessage);
        this.tasks.set(id, failed);
        return failed;
    }

    /**
     * Gets all tasks, oldest first.
     */
    getAllTasks(): VideoTask[] {
        return Array.from(this.tasks.values());
    }

    /**
     * Removes complete and failed tasks that finished more than `maxAgeMs` ago.
     * Returns the number of evicted tasks.
     */
    evictFinished(maxAgeMs: number, now: Date = new Date()): number {
        let evicted = 0;
        for (const [id, task] of this.tasks) {
            const finishedAt = task.completedAt ?? task.updatedAt;
            if (isTaskTerminal(task) && now.getTime() - finishedAt.getTime() >= maxAgeMs) {
                this.tasks.delete(id);
                evicted++;
            }
        }
        return evicted;
    }

    get size(): number {
        return this.tasks.size;
    }

    /**
     * Clears all tasks.
     */
    clear(): void {
        this.tasks.clear();
    }
}
