import { v4 as uuidv4 } from 'uuid';
import type { PlanRun, PlanRunStore, PlanRunWithLines } from '../services/planRuns.service';

export type InMemoryPlanRunStore = PlanRunStore & { runs: PlanRunWithLines[] };

export function createInMemoryPlanRunStore(): InMemoryPlanRunStore {
  const runs: PlanRunWithLines[] = [];

  return {
    runs,
    async createRun(run) {
      const stored: PlanRunWithLines = {
        id: uuidv4(),
        startedAt: run.startedAt.toISOString(),
        params: { ...run.params },
        sourceFiles: [...run.sourceFiles],
        createdAt: new Date().toISOString(),
        lines: run.lines.map((line) => ({ ...line, id: uuidv4() }))
      };
      runs.push(stored);
      return stored;
    },

    async listRuns(limit, offset) {
      return [...runs]
        .sort((a, b) => (a.startedAt < b.startedAt ? 1 : a.startedAt > b.startedAt ? -1 : 0))
        .slice(offset, offset + limit)
        .map(({ lines: _lines, ...run }): PlanRun => run);
    },

    async getRun(id) {
      return runs.find((run) => run.id === id) ?? null;
    }
  };
}
