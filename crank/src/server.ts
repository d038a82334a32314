import express, { type Express, type NextFunction, type Request, type Response } from "express";
import {
  authorizeOperator,
  claimAction,
  creditAction,
  errorResult,
  houseAction,
  joinAction,
  playerAction,
  roundAction,
  runAction,
  type ActionContext,
  type ActionResult,
} from "./actions.js";

function send(res: Response, result: ActionResult): void {
  res.setHeader("Cache-Control", "no-store");
  res.status(result.status).json(result.body);
}

/**
 * Reads are public. Every route that moves value needs the operator key: the
 * frontend's backend authenticates the wallet and calls through on its behalf.
 */
export function createActionServer(ctx: ActionContext, apiKey: string | undefined): Express {
  const app = express();
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type, x-api-key");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
    } else {
      next();
    }
  });

  const operatorOnly = (req: Request, res: Response, next: NextFunction) => {
    const denied = authorizeOperator(req.header("x-api-key"), apiKey);
    if (denied) {
      send(res, errorResult(denied));
      return;
    }
    next();
  };

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ ok: true });
  });

  app.get("/api/actions/round", (_req: Request, res: Response) => send(res, runAction(() => roundAction(ctx))));
  app.get("/api/actions/player", (req: Request, res: Response) =>
    send(res, runAction(() => playerAction(ctx, req.query)))
  );
  app.post("/api/actions/join", operatorOnly, (req: Request, res: Response) =>
    send(res, runAction(() => joinAction(ctx, req.body)))
  );
  app.post("/api/actions/claim", operatorOnly, (req: Request, res: Response) =>
    send(res, runAction(() => claimAction(ctx, req.body)))
  );
  app.post("/api/actions/credit", operatorOnly, (req: Request, res: Response) =>
    send(res, runAction(() => creditAction(ctx, req.body)))
  );
  app.post("/api/actions/house", operatorOnly, (req: Request, res: Response) =>
    send(res, runAction(() => houseAction(ctx, req.body)))
  );

  return app;
}
