import { Router } from 'express';
import { asyncHandler } from '../utils/http';
import type { ConnectionProbe } from '../services/connectionProbe';

export interface UserRouteDeps {
  connectionString: string;
  probe: ConnectionProbe;
}

export default function userRouter({ connectionString, probe }: UserRouteDeps) {
  const router = Router();

  /**
   * @openapi
   * /api/User:
   *   get:
   *     summary: Open a database connection and report the authenticated principal
   *     tags: [User]
   *     responses:
   *       200:
   *         description: Connection string in use and SYSTEM_USER
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 connectionString: { type: string }
   *                 result: { type: string }
   *       500:
   *         description: Database connection or query failed
   *         content:
   *           application/json:
   *             schema: { $ref: '#/components/schemas/Error' }
   */
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const body = await probe(connectionString);
      res.status(200).json(body);
    })
  );

  return router;
}
