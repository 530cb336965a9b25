/**
 * ExclusivityController
 *
 * Keeps track of every in-flight task that declared itself mutually
 * exclusive under one or more named categories, and chains the tasks of
 * each category into a single line of dependencies:
 *
 *   register(T1, ["x"])  →  x: [T1]
 *   register(T2, ["x"])  →  x: [T1, T2]   T2 depends on T1
 *   register(T3, ["x"])  →  x: [T1, T2, T3]   T3 depends on T2
 *
 * Exclusivity must hold across the whole process, regardless of which
 * scheduler admitted a task, so one instance is shared by everything
 * (`sharedExclusivityController`). Tasks receive it by reference.
 *
 * Both operations are synchronous and never yield, which makes each one a
 * single critical section: by the time `register()` returns, the new
 * dependency edges are in place and the task cannot have started.
 */

import type { Schedulable } from "../task/Schedulable";

export class ExclusivityController {
  /** Category name to in-flight tasks, in registration order */
  private readonly registry: Map<string, Schedulable[]> = new Map();

  /**
   * Register a task as mutually exclusive under each of the categories.
   * The task gains a dependency on the current tail of every category.
   */
  register(task: Schedulable, categories: Iterable<string>): void {
    for (const category of categories) {
      const tasks = this.registry.get(category) ?? [];

      const previous = tasks[tasks.length - 1];
      if (previous !== undefined && previous !== task) {
        task.addDependency(previous);
      }

      tasks.push(task);
      this.registry.set(category, tasks);
    }
  }

  /**
   * Remove a task from each of the categories. Dependency edges already
   * established by later tasks are left untouched. Removing a task that is
   * not registered is a no-op.
   */
  unregister(task: Schedulable, categories: Iterable<string>): void {
    for (const category of categories) {
      const tasks = this.registry.get(category);
      if (!tasks) {
        continue;
      }

      const index = tasks.indexOf(task);
      if (index === -1) {
        continue;
      }

      tasks.splice(index, 1);

      // Clean up empty categories
      if (tasks.length === 0) {
        this.registry.delete(category);
      }
    }
  }

  /**
   * In-flight tasks registered under a category, in registration order
   */
  tasksIn(category: string): readonly Schedulable[] {
    return [...(this.registry.get(category) ?? [])];
  }

  /**
   * Categories that currently have at least one in-flight task
   */
  categories(): string[] {
    return Array.from(this.registry.keys());
  }
}

/**
 * The process-wide controller. Created once, when this module is loaded.
 */
export const sharedExclusivityController = new ExclusivityController();
