/**
 * Products Routes
 * ===============
 * Public catalog reads; writes gated to ADMIN/MODERATOR. Deletes, restores
 * and stats are ADMIN only.
 */

import { type Request, type Response, Router } from "express";

import type { AccessGate } from "../../middleware/access-gate.js";
import { asyncHandler } from "../../middleware/async-handler.js";
import { ok } from "../../shared/http.js";
import {
  validateProductId,
  validateProductInput,
  validateProductsQuery,
  validateUpdateProductInput,
} from "./products.schemas.js";
import { type ProductsService, toPublicProduct } from "./products.service.js";

export type ProductsRouterDeps = {
  productsService: ProductsService;
  gate: AccessGate;
};

export function createProductsRouter({ productsService, gate }: ProductsRouterDeps): Router {
  const router = Router();

  /**
   * @swagger
   * /api/products:
   *   get:
   *     summary: List and search products
   *     tags: [Products]
   *     parameters:
   *       - in: query
   *         name: q
   *         schema:
   *           type: string
   *         description: Substring of name or description
   *       - in: query
   *         name: category
   *         schema:
   *           type: string
   *       - in: query
   *         name: minPrice
   *         schema:
   *           type: number
   *       - in: query
   *         name: maxPrice
   *         schema:
   *           type: number
   *     responses:
   *       200:
   *         description: Matching products
   *       400:
   *         description: Invalid filter
   */
  router.get(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const query = validateProductsQuery(req.query);
      const products = await productsService.list(query);
      return ok(res, { products: products.map(toPublicProduct), count: products.length });
    })
  );

  /**
   * @swagger
   * /api/products/stats:
   *   get:
   *     summary: Count products by state
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Product counts, deleted products included in the total
   *       403:
   *         description: ADMIN role required
   */
  router.get(
    "/stats",
    gate.requireRole("ADMIN"),
    asyncHandler(async (_req: Request, res: Response) => {
      const stats = await productsService.stats();
      return ok(res, {
        total_products: stats.total,
        active_products: stats.active,
        inactive_products: stats.inactive,
        deleted_products: stats.deleted,
      });
    })
  );

  /**
   * @swagger
   * /api/products/{id}:
   *   get:
   *     summary: Get a product
   *     tags: [Products]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: The product
   *       404:
   *         description: Not found
   */
  router.get(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateProductId(req.params.id);
      const product = await productsService.get(id);
      return ok(res, { product: toPublicProduct(product) });
    })
  );

  /**
   * @swagger
   * /api/products:
   *   post:
   *     summary: Create a product
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ProductInput'
   *     responses:
   *       201:
   *         description: Created
   *       409:
   *         description: Duplicate id or name
   */
  router.post(
    "/",
    gate.requireAnyRole("ADMIN", "MODERATOR"),
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateProductInput(req.body);
      const product = await productsService.create(input);
      return ok(res, { product: toPublicProduct(product) }, 201);
    })
  );

  /**
   * @swagger
   * /api/products/{id}:
   *   put:
   *     summary: Replace a product's data
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ProductInput'
   *     responses:
   *       200:
   *         description: Updated
   *       404:
   *         description: Not found
   */
  router.put(
    "/:id",
    gate.requireAnyRole("ADMIN", "MODERATOR"),
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateProductId(req.params.id);
      const input = validateUpdateProductInput(req.body);
      const product = await productsService.update(id, input);
      return ok(res, { product: toPublicProduct(product) });
    })
  );

  /**
   * @swagger
   * /api/products/{id}:
   *   delete:
   *     summary: Delete a product (soft delete)
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Deleted
   *       404:
   *         description: Not found
   */
  router.delete(
    "/:id",
    gate.requireRole("ADMIN"),
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateProductId(req.params.id);
      await productsService.remove(id);
      return ok(res, { deleted: true, id });
    })
  );

  /**
   * @swagger
   * /api/products/{id}/restore:
   *   post:
   *     summary: Restore a deleted product
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Restored product
   *       404:
   *         description: No deleted product with this id
   *       409:
   *         description: A live product already uses its name
   */
  router.post(
    "/:id/restore",
    gate.requireRole("ADMIN"),
    asyncHandler(async (req: Request, res: Response) => {
      const id = validateProductId(req.params.id);
      const product = await productsService.restore(id);
      return ok(res, { product: toPublicProduct(product) });
    })
  );

  return router;
}
