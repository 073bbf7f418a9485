import type { Request, Response } from 'express';
import { pipelineStats, type Pipelines } from '../pipeline/index.js';

export function pipelineStatsCtrl(pipelines: Pipelines) {
  return async (_req: Request, res: Response) => {
    res.json(pipelineStats(pipelines));
  };
}
