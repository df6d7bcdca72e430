import { Router } from 'express';
import { z } from 'zod';
import { UserService } from '../../../application/users/userService.js';
import { parseCommand } from '../../../application/users/dtos.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/v1/users:
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/CreateUserCommand' }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email or username already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Users]
 *     summary: List users
 *     parameters:
 *       - { in: query, name: isActive, schema: { type: boolean } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0, default: 0 } }
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 1000, default: 100 } }
 *       - { in: query, name: orderBy, schema: { type: string, enum: [id, email, username, createdAt, updatedAt] } }
 *       - { in: query, name: order, schema: { type: string, enum: [asc, desc] } }
 *     responses:
 *       200:
 *         description: A page of users
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserList' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by id
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Users]
 *     summary: Update a user's profile
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/UpdateUserCommand' }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/users/{id}/deactivate:
 *   post:
 *     tags: [Users]
 *     summary: Deactivate a user
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/users/by-email/{email}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by email
 *     parameters:
 *       - { in: path, name: email, required: true, schema: { type: string, format: email } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/v1/users/by-username/{username}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user by username
 *     parameters:
 *       - { in: path, name: username, required: true, schema: { type: string } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const userIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export function createUserRoutes(userService: UserService) {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const user = await userService.createUser(req.body);
      res.status(201).json(user);
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const page = await userService.listUsersPage(req.query);
      res.status(200).json(page);
    })
  );

  router.get(
    '/by-email/:email',
    asyncHandler(async (req, res) => {
      const user = await userService.getUser({ email: req.params.email });
      res.status(200).json(user);
    })
  );

  router.get(
    '/by-username/:username',
    asyncHandler(async (req, res) => {
      const user = await userService.getUser({ username: req.params.username });
      res.status(200).json(user);
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = parseCommand(userIdParamsSchema, req.params);
      const user = await userService.getUser({ id });
      res.status(200).json(user);
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = parseCommand(userIdParamsSchema, req.params);
      const user = await userService.updateUser(id, req.body);
      res.status(200).json(user);
    })
  );

  router.post(
    '/:id/deactivate',
    asyncHandler(async (req, res) => {
      const { id } = parseCommand(userIdParamsSchema, req.params);
      const user = await userService.deactivateUser(id);
      res.status(200).json(user);
    })
  );

  return router;
}
