import { Request, Response } from 'express';

import { sendError } from '../../common/http';
import { ValidationError } from '../../common/errors';
import { RECOMMENDATIONS_CONFIG } from '../config';
import { RecommendationService } from '../service/RecommendationService';

export class RecommendationController {
    constructor(private readonly recommendationService: RecommendationService) {}

    async getRecommendations(req: Request, res: Response) {
      try {
        const topN = parseTopN(req.query.top);
        const recommendations = await this.recommendationService.recommend(topN);

        if (recommendations.length === 0) {
          res.json({
            message: 'No eligible books found. Adjust the vetoes or add more books to the pool.',
            recommendations,
          });
          return;
        }

        res.json({ message: `Found ${recommendations.length} recommendations`, recommendations });
      } catch (error) {
        sendError(res, error, 'Failed to build recommendations');
      }
    }

    async getGenres(_req: Request, res: Response) {
      try {
        res.json({ genres: await this.recommendationService.distinctCategoriesInPool() });
      } catch (error) {
        sendError(res, error, 'Failed to list genres');
      }
    }

    async getCurrentRound(_req: Request, res: Response) {
      try {
        res.json(await this.recommendationService.roundContext());
      } catch (error) {
        sendError(res, error, 'Failed to read the current round');
      }
    }
}

function parseTopN(raw: unknown): number {
  if (raw === undefined || raw === '') {
    return RECOMMENDATIONS_CONFIG.DEFAULT_TOP_N;
  }
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    throw new ValidationError('Query parameter "top" must be a positive integer');
  }
  return Number(raw);
}
