export type MementoOperation = 'CREATE' | 'UPDATE' | 'DELETE';

export type TaskPriority = 'LOW' | 'MEDIUM' | 'HIGH' | 'URGENT';
export type TaskStatus = 'PENDING' | 'IN_PROGRESS' | 'COMPLETED' | 'CANCELLED';

export const TASK_PRIORITIES: readonly TaskPriority[] = ['LOW', 'MEDIUM', 'HIGH', 'URGENT'];
export const TASK_STATUSES: readonly TaskStatus[] = ['PENDING', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED'];

export const PRIORITY_WEIGHT: Record<TaskPriority, number> = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  URGENT: 4,
};

export interface LibraryItem {
  id: string; // ULID
  title: string;
  category: string;
  tags: string[]; // normalized, unique
  rating: number; // 0..5
  description: string;
  filePath?: string;
  mediaUrl?: string;
  fileType?: string; // extension incl. dot, e.g. ".pdf"
  fileSize: number; // bytes
  createdAt: string; // ISO
  lastModified: string; // ISO
}

/** Fields a caller may supply when creating an item. */
export type ItemInput = Partial<Omit<LibraryItem, 'title' | 'createdAt' | 'lastModified'>> & {
  title: string;
  createdAt?: string;
};

export interface Memento {
  id: string;
  operation: MementoOperation;
  item: Readonly<LibraryItem>;
  description: string;
  createdAt: string;
}

export interface SearchResult {
  item: LibraryItem;
  score: number;
  keywordMatches: number;
  tagFrequency: number;
  ratingWeight: number;
  recencyBonus: number;
}

export interface Task {
  id: string;
  itemId?: string;
  itemTitle?: string;
  description: string;
  priority: TaskPriority;
  deadline?: string; // ISO
  status: TaskStatus;
  createdAt: string; // ISO
  notes?: string;
  estimatedMinutes?: number;
}

export type TaskInput = Partial<Omit<Task, 'description'>> & { description: string };

export interface IndexSnapshot {
  keywordIndex: Record<string, string[]>;
  tagFrequency: Record<string, number>;
  pathIndex: Record<string, string>;
}

/** Everything the persistence engine reads and writes. */
export interface LibraryState extends IndexSnapshot {
  savedAt: string;
  items: LibraryItem[];
  tasks: Task[];
  recentlyViewed: string[]; // oldest first, top of stack last
  undoHistory: Memento[]; // oldest first, top of stack last
  /** Ids that belonged to deleted items; never handed to a new item. */
  retiredIds: string[];
}

export interface UndoResult {
  undone: boolean;
  message: string;
  operation?: MementoOperation;
  itemId?: string;
}

export interface ImportSummary {
  imported: LibraryItem[];
  skippedPaths: string[];
  /** One message per candidate that failed validation. */
  errors: string[];
}

export interface LibraryStatistics {
  totalItems: number;
  mediaItems: number;
  documentItems: number;
  totalKeywords: number;
  uniqueTags: number;
  totalTasks: number;
  overdueTasks: number;
  recentlyViewedCount: number;
  undoHistorySize: number;
  backupsAvailable: number;
  categoryCounts: Record<string, number>;
}

export interface LibraryConfig {
  maxUndo: number;
  maxRecent: number;
  maxBackups: number;
  logLevel: LogLevel;
  logFormat: 'text' | 'json';
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
