import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCRAPE_TASKS, ScrapeTask } from '../interfaces/task.interface';

export interface TaskDescription {
  name: string;
  description: string;
}

@Injectable()
export class TaskRegistryService {
  private readonly logger = new Logger(TaskRegistryService.name);
  private readonly tasks = new Map<string, ScrapeTask>();

  constructor(@Inject(SCRAPE_TASKS) tasks: ScrapeTask[]) {
    for (const task of tasks) {
      if (this.tasks.has(task.name)) {
        throw new Error(`Task '${task.name}' is registered twice`);
      }
      this.tasks.set(task.name, task);
    }
    this.logger.log(`Registered tasks: ${this.names().join(', ')}`);
  }

  /** Accepts `booking_hotels` as well as `booking-hotels`. */
  get(name: string): ScrapeTask | undefined {
    const normalized = name.trim().toLowerCase();
    const candidates = [
      normalized,
      normalized.replace(/_/g, '-'),
      normalized.replace(/-/g, '_'),
    ];
    for (const candidate of candidates) {
      const task = this.tasks.get(candidate);
      if (task) return task;
    }
    return undefined;
  }

  names(): string[] {
    return [...this.tasks.keys()].sort();
  }

  /** Name and description of every task, for the health endpoint. */
  describe(): TaskDescription[] {
    return this.names().map((name) => ({
      name,
      description: this.tasks.get(name)?.description ?? '',
    }));
  }
}
