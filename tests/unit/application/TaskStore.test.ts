import { TaskStore } from '../../../src/application/TaskStore';
import { attachJobHandle, VideoTaskInput } from '../../../src/domain/entities/VideoTask';
import { TaskNotFoundError } from '../../../src/domain/errors/PipelineErrors';

describe('TaskStore', () => {
    const input: VideoTaskInput = { sourceFileName: 'beach', modelVariant: 'veo-3-fast' };

    describe('createTask', () => {
        it('should create tasks with unique IDs', () => {
            const store = new TaskStore();

            const task1 = store.createTask(input);
            const task2 = store.createTask(input);

            expect(task1.id).not.toBe(task2.id);
            expect(task1.id).toMatch(/^task_[0-9a-f-]{36}$/);
            expect(task1.stage).toBe('preparing');
            expect(store.size).toBe(2);
        });
    });

    describe('lookup', () => {
        it('should return null for unknown IDs from getTask', () => {
            expect(new TaskStore().getTask('task_missing')).toBeNull();
        });

        it('should throw TaskNotFoundError for unknown IDs from requireTask', () => {
            const store = new TaskStore();

            expect(() => store.requireTask('task_missing')).toThrow(TaskNotFoundError);
            expect(() => store.requireTask('task_missing')).toThrow('Task not found: task_missing');
        });

        it('should keep separate stores isolated', () => {
            const first = new TaskStore();
            const second = new TaskStore();
            const task = first.createTask(input);

            expect(second.getTask(task.id)).toBeNull();
        });
    });

    describe('updates', () => {
        it('should advance stages', () => {
            const store = new TaskStore();
            const task = store.createTask(input);

            store.advanceStage(task.id, 'submitted');

            expect(store.requireTask(task.id).stage).toBe('submitted');
        });

        it('should store the result of a transition', () => {
            const store = new TaskStore();
            const task = store.createTask(input);
            const handle = { operationName: 'op-1', modelId: 'veo-2.0-generate-001', storageUri: 'gs://b/j/' };

            store.updateTask(task.id, (t) => attachJobHandle(t, handle, 'prompt'));

            expect(store.requireTask(task.id).jobHandle).toEqual(handle);
        });

        it('should reject transitions that change the ID', () => {
            const store = new TaskStore();
            const task = store.createTask(input);

            expect(() => store.updateTask(task.id, (t) => ({ ...t, id: 'other' })))
                .toThrow(`Task transition changed id ${task.id} to other`);
        });

        it('should fail a task once and leave terminal tasks unchanged', () => {
            const store = new TaskStore();
            const task = store.createTask(input);

            const failed = store.failTask(task.id, 'first error');
            const again = store.failTask(task.id, 'second error');

            expect(failed.stage).toBe('failed');
            expect(again.error).toBe('first error');
        });
    });

    describe('evictFinished', () => {
        it('should evict only finished tasks older than the retention window', () => {
            const store = new TaskStore();
            const running = store.createTask(input);
            const failed = store.createTask(input);
            const finishedAt = store.failTask(failed.id, 'boom').completedAt;
            if (!finishedAt) {
                throw new Error('failed task has no completedAt');
            }

            expect(store.evictFinished(60_000, new Date(finishedAt.getTime() + 59_999))).toBe(0);
            expect(store.evictFinished(60_000, new Date(finishedAt.getTime() + 60_000))).toBe(1);

            expect(store.getTask(failed.id)).toBeNull();
            expect(store.getTask(running.id)).not.toBeNull();
        });
    });

    it('should list and clear tasks', () => {
        const store = new TaskStore();
        store.createTask(input);
        store.createTask(input);

        expect(store.getAllTasks()).toHaveLength(2);
        store.clear();
        expect(store.getAllTasks()).toHaveLength(0);
    });
});
