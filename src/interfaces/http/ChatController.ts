/**
 * Chat HTTP controllers.
 *
 * - POST /chat validates the body and delegates to ChatService
 * - GET /conversations/:userId/:conversationId/summary summarises one
 *   conversation from the user's stored memories
 */
import type { ChatService } from "@app/chat/ChatUseCase";
import {
  ChatRequestSchema,
  ChatResponseSchema,
} from "@interfaces/http/chat/schema";
import { ConversationParamsSchema } from "@interfaces/http/memory/schema";
import { ValidationError } from "@middleware/errorHandler";
import type {
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";

export function chatController(chatService: ChatService): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ChatRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      return next(
        new ValidationError("Invalid request", { issues: parsed.error.issues })
      );
    }

    try {
      const result = await chatService.processMessage(parsed.data);

      const checked = ChatResponseSchema.safeParse(result);
      if (!checked.success) {
        return next(
          new ValidationError("Invalid response", 500, {
            issues: checked.error.issues,
          })
        );
      }

      res.json(checked.data);
    } catch (err: unknown) {
      next(err);
    }
  };
}

export function conversationSummaryController(
  chatService: ChatService
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ConversationParamsSchema.safeParse(req.params);

    if (!parsed.success) {
      return next(
        new ValidationError("Invalid request", { issues: parsed.error.issues })
      );
    }

    try {
      const { userId, conversationId } = parsed.data;
      const summary = await chatService.getConversationSummary(
        userId,
        conversationId
      );

      res.json({ userId, conversationId, summary });
    } catch (err: unknown) {
      next(err);
    }
  };
}
