import { Router, Request, Response } from 'express';
import { TaskStore } from '../../application/TaskStore';
import { VideoTask } from '../../domain/entities/VideoTask';
import { asyncHandler } from '../middleware/errorHandler';

/**
 * Status payload for one task. Fields appear as the task progresses.
 */
export function toTaskStatusResponse(task: VideoTask): Record<string, unknown> {
    const response: Record<string, unknown> = {
        taskId: task.id,
        status: task.stage,
        message: task.progressMessage,
        createdAt: task.createdAt.toISOString(),
        updatedAt: task.updatedAt.toISOString(),
    };

    if (task.preparedImage) {
        response.targetAspectRatio = task.preparedImage.targetAspectRatio;
        response.originalAspectRatio = task.preparedImage.originalAspectRatio;
    }

    if (task.jobHandle) {
        response.operationName = task.jobHandle.operationName;
        response.modelId = task.jobHandle.modelId;
    }

    if (task.stage === 'failed' && task.error) {
        response.error = task.error;
    }

    if (task.stage === 'complete') {
        response.finalVideoUrl = task.finalVideoUrl;
        response.generatedVideoUri = task.generatedVideoUri;
        response.generatedVideoUrl = task.generatedVideoUrl;
    }

    return response;
}

/**
 * Creates task status routes with dependency injection.
 */
export function createTaskRoutes(taskStore: TaskStore): Router {
    const router = Router();

    /**
     * GET /tasks/:taskId
     *
     * Returns the current stage and results of a task.
     * Unknown IDs are a 404; failed tasks are a 200 with status "failed".
     */
    router.get(
        '/tasks/:taskId',
        asyncHandler(async (req: Request, res: Response) => {
            const task = taskStore.requireTask(req.params.taskId);
            res.json(toTaskStatusResponse(task));
        })
    );

    /**
     * GET /tasks
     *
     * Lists all tasks (for debugging/monitoring).
     */
    router.get(
        '/tasks',
        asyncHandler(async (req: Request, res: Response) => {
            const summaries = taskStore.getAllTasks().map((task) => ({
                taskId: task.id,
                status: task.stage,
                sourceFileName: task.sourceFileName,
                createdAt: task.createdAt.toISOString(),
                updatedAt: task.updatedAt.toISOString(),
            }));

            res.json({
                total: summaries.length,
                tasks: summaries,
            });
        })
    );

    return router;
}
