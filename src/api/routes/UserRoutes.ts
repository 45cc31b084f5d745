import express, { Request, Response, Router } from 'express';
import UserController from '../controllers/UserController';
import { sendError } from './ApiErrors';

export function createUserRoutes(controller: UserController): Router {
  const router = express.Router();

  /**
   * @openapi
   * /api/users/{user}:
   *   get:
   *     tags:
   *      - users
   *     description: Get the balance, gauge allocations and delegations of a user
   *     parameters:
   *       - in: path
   *         name: user
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Get the balance, gauge allocations and delegations of a user
   *       400:
   *         description: Invalid address
   */
  router.get('/users/:user', (req: Request, res: Response) => {
    try {
      res.status(200).json(controller.GetUser(req.params.user));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
