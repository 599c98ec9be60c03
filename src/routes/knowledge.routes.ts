import express from 'express';
import { Services } from '../services';
import { createError } from '../middleware/error.middleware';
import { EMERGENCY_CONTACTS, tipOfTheDay } from '../config/content';

export const createKnowledgeRouter = ({ knowledge, session }: Services) => {
  const router = express.Router();

  router.get('/stats', (req, res) => {
    res.json({
      success: true,
      data: {
        ...knowledge.getStats(),
        queries: session.getHistoryCount(),
      },
    });
  });

  router.get('/conditions/:id', (req, res, next) => {
    const condition = knowledge.getCondition(req.params.id);
    if (!condition) {
      return next(createError('Condition not found', 404));
    }
    res.json({ success: true, data: condition });
  });

  router.get('/drugs/:id', (req, res, next) => {
    const drug = knowledge.getDrug(req.params.id);
    if (!drug) {
      return next(createError('Drug not found', 404));
    }
    res.json({ success: true, data: drug });
  });

  router.get('/symptoms/:id', (req, res, next) => {
    const symptom = knowledge.getSymptom(req.params.id);
    if (!symptom) {
      return next(createError('Symptom not found', 404));
    }
    res.json({ success: true, data: symptom });
  });

  router.get('/emergency-conditions', (req, res) => {
    res.json({ success: true, data: knowledge.getEmergencyConditionNames() });
  });

  router.get('/emergency-contacts', (req, res) => {
    res.json({ success: true, data: EMERGENCY_CONTACTS });
  });

  router.get('/tip', (req, res) => {
    res.json({ success: true, data: { tip: tipOfTheDay() } });
  });

  return router;
};
