import type { Priority } from './priority.js';

/** Server-assigned integer ids */
export type TaskId = number;
export type CategoryId = number;

/** yyyy-MM-dd */
export type IsoDate = string;

export interface Category {
  readonly id: CategoryId;
  readonly name: string;
  readonly color: string;
  readonly createdAt: string | null; // ISO string
}

export interface Task {
  readonly id: TaskId;
  readonly content: string;
  readonly completed: boolean;
  readonly priority: Priority;
  readonly startDate: IsoDate | null;
  readonly dueDate: IsoDate | null;
  /** Weak reference; may point at a deleted category */
  readonly categoryId: CategoryId | null;
  readonly order: number;
  readonly createdAt: string | null; // ISO string
  readonly updatedAt: string | null; // ISO string
}

/** Fields the client supplies when creating a task */
export interface TaskDraft {
  readonly content: string;
  readonly priority?: Priority;
  readonly startDate?: IsoDate | null;
  readonly dueDate?: IsoDate | null;
  readonly categoryId?: CategoryId | null;
}

/** Any subset of the editable task fields; null clears an optional field */
export interface TaskPatch {
  readonly content?: string;
  readonly completed?: boolean;
  readonly priority?: Priority;
  readonly startDate?: IsoDate | null;
  readonly dueDate?: IsoDate | null;
  readonly categoryId?: CategoryId | null;
  readonly order?: number;
}

/** Fields a batch update may set on every selected task */
export interface BatchPatch {
  readonly completed?: boolean;
  readonly priority?: Priority;
  readonly categoryId?: CategoryId | null;
}

export interface OrderEntry {
  readonly id: TaskId;
  readonly order: number;
}

export const MAX_CONTENT_LENGTH = 200;
export const MAX_CATEGORY_NAME_LENGTH = 50;
export const DEFAULT_CATEGORY_COLOR = '#007bff';
