import { Router } from 'express';
import { z } from 'zod';
import { UserService } from '../../../application/users/userService.js';
import { RateLimitConfig } from '../../../config.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { sendOutcome } from '../outcomeMapping.js';

/**
 * @openapi
 * /users:
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/UserRequest'
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserResponse'
 *       400:
 *         description: Missing or blank username/password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ApiResponse'
 *       409:
 *         description: Username already taken
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ApiResponse'
 *
 * /users/login:
 *   post:
 *     tags: [Users]
 *     summary: Log in with username and password
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/UserRequest'
 *     responses:
 *       200:
 *         description: Login successful
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserResponse'
 *       400:
 *         description: Missing or blank username/password
 *       401:
 *         description: Wrong password
 *       404:
 *         description: Unknown username
 *       429:
 *         description: Too many login attempts
 *
 * /users/{userId}:
 *   get:
 *     tags: [Users]
 *     summary: Fetch a user by id
 *     parameters:
 *       - in: path
 *         name: userId
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: User fetched
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/UserResponse'
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ApiResponse'
 */

// Presence is checked by the service; this only rejects wrong types
// and NUL, which PostgreSQL text columns cannot hold.
const userRequestSchema = z.object({
  username: z
    .string()
    .refine((value) => !value.includes('\u0000'), 'Must not contain NUL characters')
    .nullish(),
  password: z.string().nullish(),
});

export function createUserRoutes(userService: UserService, rateLimit: RateLimitConfig) {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = userRequestSchema.parse(req.body);
      sendOutcome(res, await userService.createUser(body));
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(rateLimit),
    asyncHandler(async (req, res) => {
      const body = userRequestSchema.parse(req.body);
      sendOutcome(res, await userService.loginUser(body));
    })
  );

  router.get(
    '/:userId',
    asyncHandler(async (req, res) => {
      sendOutcome(res, await userService.getUserById(req.params.userId));
    })
  );

  return router;
}
