import express from 'express';
import { Services } from '../services';
import { parseBody, updateProfileSchema } from '../utils/validation';

export const createHistoryRouter = ({ session }: Services) => {
  const router = express.Router();

  router.get('/', (req, res) => {
    const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : 5;
    res.json({
      success: true,
      data: session.getHistory(Number.isNaN(limit) ? 5 : limit),
    });
  });

  router.delete('/', (req, res) => {
    session.clearHistory();
    res.json({
      success: true,
      message: 'History cleared',
    });
  });

  return router;
};

export const createProfileRouter = ({ session }: Services) => {
  const router = express.Router();

  router.get('/', (req, res) => {
    res.json({
      success: true,
      data: session.getProfile(),
    });
  });

  router.put('/', (req, res, next) => {
    try {
      const updates = parseBody(updateProfileSchema, req.body);
      res.json({
        success: true,
        data: session.updateProfile(updates),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
