// src/engine/projectQueue.ts

import type { Project } from '../models/Project';

/**
 * Priority queue of projects awaiting allocation
 *
 * Maintains projects in ascending priority (1 = most urgent first).
 * Equal priorities fall back to input order (Project.order), whatever
 * order the projects were enqueued in.
 *
 * The project list is small and known upfront, so a sorted array is enough.
 */
export class ProjectQueue {
    private queue: Project[];

    constructor(projects: readonly Project[] = []) {
        this.queue = [];
        for (const project of projects) {
            this.enqueue(project);
        }
    }

    /**
     * Add a project, maintaining (priority, input order) order
     */
    enqueue(project: Project): void {
        let insertIndex = this.queue.length;
        for (let i = 0; i < this.queue.length; i++) {
            if (comesBefore(project, this.queue[i])) {
                insertIndex = i;
                break;
            }
        }

        this.queue.splice(insertIndex, 0, project);
    }

    /**
     * Remove and return the most urgent project
     *
     * @returns Most urgent project or null if queue empty
     */
    dequeue(): Project | null {
        return this.queue.shift() ?? null;
    }
}

function comesBefore(a: Project, b: Project): boolean {
    if (a.priority !== b.priority) {
        return a.priority < b.priority;
    }
    return a.order < b.order;
}
