import { LinearClient } from "@linear/sdk";

export interface LinearUser {
  id: string;
  name: string;
  email: string;
}

export interface NewIssue {
  teamId: string;
  title: string;
  description: string;
  assigneeId?: string;
  dueDate?: string;
  /** Linear's scale: 1 urgent, 2 high, 3 medium, 4 low. */
  priority?: number;
}

export interface CreatedIssue {
  id: string;
  identifier?: string;
  url?: string;
}

/** What the task sink needs from Linear. */
export interface LinearApi {
  listUsers(): Promise<LinearUser[]>;
  createIssue(input: NewIssue): Promise<CreatedIssue>;
}

export function createLinearApi(apiKey: string): LinearApi {
  const client = new LinearClient({ apiKey });

  return {
    async listUsers() {
      const users = await client.users();
      return users.nodes.map((u) => ({ id: u.id, name: u.name, email: u.email || "" }));
    },

    async createIssue(input) {
      const payload = await client.createIssue({
        teamId: input.teamId,
        title: input.title,
        description: input.description,
        ...(input.assigneeId ? { assigneeId: input.assigneeId } : {}),
        ...(input.dueDate ? { dueDate: input.dueDate } : {}),
        ...(input.priority ? { priority: input.priority } : {}),
      });

      const issue = await payload.issue;
      if (!payload.success || !issue) {
        throw new Error(`Linear did not create issue "${input.title}"`);
      }
      return { id: issue.id, identifier: issue.identifier, url: issue.url };
    },
  };
}

export function fuzzyMatchUser(users: readonly LinearUser[], name: string): LinearUser | null {
  if (!name) return null;
  const lower = name.toLowerCase().trim();

  // Exact name or email local part
  const exact = users.find(
    (u) => u.name.toLowerCase() === lower || u.email.toLowerCase().split("@")[0] === lower || u.email.toLowerCase() === lower
  );
  if (exact) return exact;

  // Partial (first name)
  const partial = users.find((u) => u.name.toLowerCase().startsWith(lower) || u.name.toLowerCase().includes(lower));
  if (partial) return partial;

  return null;
}
