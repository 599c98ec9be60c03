import express from 'express';
import { Services } from '../services';
import { interactionCheckSchema, parseBody } from '../utils/validation';

export const createInteractionRouter = ({ interactions }: Services) => {
  const router = express.Router();

  router.post('/check', (req, res, next) => {
    try {
      const { medications } = parseBody(interactionCheckSchema, req.body);
      const found = interactions.checkInteractions(medications);

      res.json({
        success: true,
        data: {
          interactions: found,
          message: found.length > 0
            ? `Found ${found.length} known interaction(s)`
            : 'No known major interactions found in our database. Always consult your pharmacist or doctor for comprehensive interaction checking.',
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
