import express, { type Router } from 'express';
import { getMonitoringDashboard } from '../middleware/errorHandling';

export default function monitoringRoutes(): Router {
  const router = express.Router();
  router.get('/', getMonitoringDashboard);
  return router;
}
