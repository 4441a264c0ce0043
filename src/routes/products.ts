/**
 * Product routes.
 * GET    /products      — list every product (public).
 * GET    /products/:id  — fetch one product (public).
 * POST   /products      — create a product (requires auth).
 * PUT    /products/:id  — partial update (requires auth).
 * PATCH  /products/:id  — partial update (requires auth).
 * DELETE /products/:id  — delete a product (requires auth + admin).
 *
 * Updates write every key present in the body, including 0, "" and null;
 * keys left out keep their stored value.
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { requireAdmin, requireAuth } from "../middleware/auth";
import { toProductView } from "../models/product";
import { logger } from "../config/logger";
import { parseId, sendValidationError, PG_INTEGER_MAX } from "./validation";

const productFields = {
  name: z
    .string({ required_error: "Name is required", invalid_type_error: "Name must be a string" })
    .min(1, "Name must not be empty")
    .max(100, "Name must be at most 100 characters"),
  description: z.string({ invalid_type_error: "Description must be a string" }).nullable(),
  price: z
    .number({ required_error: "Price is required", invalid_type_error: "Price must be a number" })
    .finite()
    .nonnegative("Price must not be negative"),
  stock: z
    .number({ invalid_type_error: "Stock must be a number" })
    .int("Stock must be an integer")
    .nonnegative("Stock must not be negative")
    .max(PG_INTEGER_MAX, `Stock must be at most ${PG_INTEGER_MAX}`)
    .nullable(),
};

const createProductSchema = z.object({
  name: productFields.name,
  price: productFields.price,
  description: productFields.description.default(null),
  stock: productFields.stock.default(null),
});

const updateProductSchema = z.object(productFields).partial();

function notFound(res: Response, rawId: string): void {
  res.status(404).json({ error: `Product with id ${rawId} does not exist`, code: "PRODUCT_NOT_FOUND" });
}

export function createProductsRouter(ctx: AppContext): Router {
  const productsRouter = Router();
  const authenticate = requireAuth(ctx.config);
  const adminOnly = requireAdmin(ctx.users, "Not authorised to delete a product");

  productsRouter.get("/", async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const products = await ctx.products.list();
      res.status(200).json(products.map(toProductView));
    } catch (err: unknown) {
      next(err);
    }
  });

  productsRouter.get("/:id", async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const id = parseId(req.params.id);

    try {
      const product = id === null ? null : await ctx.products.findById(id);
      if (!product) {
        notFound(res, req.params.id);
        return;
      }
      res.status(200).json(toProductView(product));
    } catch (err: unknown) {
      next(err);
    }
  });

  productsRouter.post("/", authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parsed = createProductSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const product = await ctx.products.create(parsed.data);
      logger.info("products", "Product created", { productId: product.id, userId: req.user?.userId });
      res.status(201).json(toProductView(product));
    } catch (err: unknown) {
      next(err);
    }
  });

  const updateProduct = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const id = parseId(req.params.id);
    if (id === null) {
      notFound(res, req.params.id);
      return;
    }

    const parsed = updateProductSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const product = await ctx.products.update(id, parsed.data);
      if (!product) {
        notFound(res, req.params.id);
        return;
      }
      res.status(200).json(toProductView(product));
    } catch (err: unknown) {
      next(err);
    }
  };

  productsRouter.put("/:id", authenticate, updateProduct);
  productsRouter.patch("/:id", authenticate, updateProduct);

  productsRouter.delete(
    "/:id",
    authenticate,
    adminOnly,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const id = parseId(req.params.id);

      try {
        const removed = id === null ? false : await ctx.products.remove(id);
        if (!removed) {
          notFound(res, req.params.id);
          return;
        }
        logger.info("products", "Product deleted", { productId: id, userId: req.user?.userId });
        res.status(200).json({ message: `Product with id ${req.params.id} has been deleted.` });
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  return productsRouter;
}
