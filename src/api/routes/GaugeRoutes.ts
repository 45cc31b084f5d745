import express, { Request, Response, Router } from 'express';
import SimpleCacheService from '../../services/cache/CacheService';
import GaugeController from '../controllers/GaugeController';
import { GaugesResponse, TotalsResponse } from '../model/GaugeResponse';
import { sendError } from './ApiErrors';

const CACHE_DURATION = 30 * 1000;

export function createGaugeRoutes(controller: GaugeController): Router {
  const router = express.Router();
  const gaugesCache = new SimpleCacheService<GaugesResponse>();
  const totalsCache = new SimpleCacheService<TotalsResponse>();

  /**
   * @openapi
   * /api/gauges:
   *   get:
   *     tags:
   *      - gauges
   *     description: Get every gauge ever added, with its live and stored weight
   *     responses:
   *       200:
   *         description: Get every gauge ever added, with its live and stored weight
   */
  router.get('/gauges', (req: Request, res: Response) => {
    try {
      const data = gaugesCache.GetAndCache('/gauges', () => controller.GetGauges(), CACHE_DURATION);
      res.status(200).json(data);
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * @openapi
   * /api/totals:
   *   get:
   *     tags:
   *      - gauges
   *     description: Get the total and per type weights of the live gauges
   *     responses:
   *       200:
   *         description: Get the total and per type weights of the live gauges
   */
  router.get('/totals', (req: Request, res: Response) => {
    try {
      const data = totalsCache.GetAndCache('/totals', () => controller.GetTotals(), CACHE_DURATION);
      res.status(200).json(data);
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * @openapi
   * /api/gauges/{gauge}:
   *   get:
   *     tags:
   *      - gauges
   *     description: Get a gauge and the users allocating to it
   *     parameters:
   *       - in: path
   *         name: gauge
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Get a gauge and the users allocating to it
   *       404:
   *         description: The gauge was never added
   */
  router.get('/gauges/:gauge', (req: Request, res: Response) => {
    try {
      const data = controller.GetGauge(req.params.gauge);
      if (!data) {
        res.status(404).json({ error: 'Not found', msg: `Unknown gauge ${req.params.gauge}` });
        return;
      }
      res.status(200).json(data);
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * @openapi
   * /api/gauges/{gauge}/allocation:
   *   get:
   *     tags:
   *      - gauges
   *     description: Get the share of an amount the gauge receives, with live and stored weights
   *     parameters:
   *       - in: path
   *         name: gauge
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: amount
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Get the share of an amount the gauge receives
   *       400:
   *         description: Invalid gauge address or amount
   */
  router.get('/gauges/:gauge/allocation', (req: Request, res: Response) => {
    const amount = req.query.amount;
    if (typeof amount !== 'string' || !/^\d+$/.test(amount)) {
      res.status(400).json({ error: 'Bad request', msg: 'amount must be a non negative integer' });
      return;
    }
    try {
      res.status(200).json(controller.GetAllocation(req.params.gauge, BigInt(amount)));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
