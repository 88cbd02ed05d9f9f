import { Router } from 'express';
import type { ReviewRepository } from '../repositories/review-repository.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * GET /reviews/:id
 * Returns the review row with its counters and status.
 */
export function createReviewRouter(reviews: Pick<ReviewRepository, 'findById'>): Router {
  const router = Router();

  router.get('/:id', async (req, res, next) => {
    try {
      const { id } = req.params;
      if (!UUID_RE.test(id)) return res.status(404).json({ error: 'not found' });

      const review = await reviews.findById(id);
      if (!review) return res.status(404).json({ error: 'not found' });
      return res.json(review);
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
