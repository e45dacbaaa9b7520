import express from "express";
import { verifyWebhook } from "@clerk/express/webhooks";
import {
  handleSessionCreated,
  handleUserCreated,
  handleUserDeleted,
  handleUserUpdated,
} from "../application/clerk-events";
import { UserDirectory } from "../application/user-directory";

export const createWebhooksRouter = (users: UserDirectory) => {
  const webhooksRouter = express.Router();

  webhooksRouter.post(
    "/clerk",
    express.raw({ type: "application/json" }),
    async (req, res, next) => {
      let evt: Awaited<ReturnType<typeof verifyWebhook>>;
      try {
        evt = await verifyWebhook(req);
      } catch (err) {
        console.error("[Webhook] Error verifying webhook:", err);
        res.status(400).send("Error verifying webhook");
        return;
      }

      console.log(`[Webhook] Received ${evt.type}`);

      try {
        if (evt.type === "user.created") {
          const user = await handleUserCreated(users, evt.data);
          console.log(`[Webhook] User ${user.username} ready`);
        }

        if (evt.type === "user.updated") {
          await handleUserUpdated(users, evt.data);
        }

        if (evt.type === "user.deleted") {
          await handleUserDeleted(users, evt.data);
        }

        if (evt.type === "session.created") {
          await handleSessionCreated(users, evt.data);
        }

        res.send("Webhook received");
      } catch (error) {
        next(error);
      }
    }
  );

  return webhooksRouter;
};
