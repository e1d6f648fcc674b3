import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import { ZodError } from "zod";
import travelTips from "./data/travel-tips.json";
import {
  authenticateToken,
  issueToken,
  SessionContext,
  withSession,
} from "./middleware/auth";
import { loginSchema, registrationSchema } from "./schemas/credentials";
import userPreferencesSchema, {
  BUDGET_RANGES,
  DEFAULT_INTERESTS,
  GROUP_SIZES,
  INTERESTS,
  SEASONS,
  TRAVEL_STYLES,
} from "./schemas/userInput";
import { Configuration } from "./utils/configuration";
import {
  DuplicateUserError,
  StoreFailure,
  UnknownUserError,
} from "./utils/errors";
import { GenerationEndpoint } from "./utils/generation";
import { appendHistory } from "./utils/history";
import { generateItinerary } from "./utils/itineraryAdapter";
import { generatePackingList } from "./utils/packingList";
import { verifyPassword, hashPassword } from "./utils/passwords";
import { renderHistoryMarkdown, toItineraryView } from "./utils/presenter";
import { CredentialStore } from "./utils/userStore";
import { describeSeasonWeather } from "./utils/weather";

export interface AppDependencies {
  store: CredentialStore;
  endpoint: GenerationEndpoint;
  configuration: Pick<
    Configuration,
    "jwtSecret" | "jwtExpiresIn" | "bcryptRounds"
  >;
  /** Clock for history timestamps. */
  now?: () => Date;
}

const ITINERARY_ERROR = "Failed to generate itinerary. Please try again.";
const PACKING_LIST_ERROR = "Failed to generate packing list. Please try again.";
const HISTORY_ERROR = "Your itinerary could not be saved to your trips.";
const STORAGE_ERROR = "Storage is unavailable. Please try again later.";

// Client errors raised by the body parser carry an HTTP status and `expose`.
function clientErrorStatus(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500 &&
    "expose" in error &&
    error.expose === true
  ) {
    return error.status;
  }
  return undefined;
}

function validationMessage(error: ZodError): string {
  return error.issues[0]?.message ?? "Invalid request";
}

export function createApp({
  store,
  endpoint,
  configuration,
  now = () => new Date(),
}: AppDependencies): Express {
  const app = express();
  app.use(express.json());
  app.use(cors());

  const requireAuth = authenticateToken(configuration.jwtSecret);

  app.get("/", (req: Request, res: Response) => {
    res.send("Travelstar Planner Server");
  });

  // Values the planning form offers
  app.get("/options", (req: Request, res: Response) => {
    res.json({
      budgets: BUDGET_RANGES,
      travel_styles: TRAVEL_STYLES,
      interests: INTERESTS,
      default_interests: DEFAULT_INTERESTS,
      seasons: SEASONS,
      group_sizes: GROUP_SIZES,
      duration: { min: 1, max: 30, default: 5 },
    });
  });

  app.get("/tips", (req: Request, res: Response) => {
    res.json(travelTips);
  });

  app.post("/auth/register", async (req: Request, res: Response, next: NextFunction) => {
    const body = registrationSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: validationMessage(body.error) });
      return;
    }

    try {
      const digest = await hashPassword(body.data.password, configuration.bcryptRounds);
      await store.insert(body.data.username, digest);
      console.log("[API] Registered user:", body.data.username);
      res.status(201).json({ message: "Registration successful! Please login." });
    } catch (error) {
      next(error);
    }
  });

  app.post("/auth/login", async (req: Request, res: Response, next: NextFunction) => {
    const body = loginSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: validationMessage(body.error) });
      return;
    }

    try {
      const user = await store.find(body.data.username);
      if (!user || !(await verifyPassword(user.password, body.data.password))) {
        res.status(401).json({ error: "Invalid username or password" });
        return;
      }
      const token = issueToken(
        user._id,
        configuration.jwtSecret,
        configuration.jwtExpiresIn
      );
      res.json({ token, username: user._id });
    } catch (error) {
      next(error);
    }
  });

  app.post(
    "/itineraries",
    requireAuth,
    withSession(async (session: SessionContext, req: Request, res: Response) => {
      const preferences = userPreferencesSchema.safeParse(req.body);
      if (!preferences.success) {
        res.status(400).json({
          error: validationMessage(preferences.error),
          issues: preferences.error.issues,
        });
        return;
      }
      const { destination, season } = preferences.data;

      const outcome = await generateItinerary(endpoint, preferences.data);
      if (!outcome.ok) {
        console.log("[API] Itinerary generation failed:", outcome.failure.reason);
        res.status(502).json({ error: ITINERARY_ERROR, reason: outcome.failure.reason });
        return;
      }
      const itinerary = outcome.value;

      // A failed history write is reported next to the itinerary, never instead of it
      let history: { saved: boolean; error?: string };
      try {
        await appendHistory(store, session.username, destination, itinerary, now);
        history = { saved: true };
      } catch (error) {
        console.error("[STORE] Failed to save itinerary to history:", error);
        history = { saved: false, error: HISTORY_ERROR };
      }

      res.json({
        itinerary,
        view: toItineraryView(itinerary),
        weather: describeSeasonWeather(season, destination),
        history,
      });
    })
  );

  app.post(
    "/packing-list",
    requireAuth,
    withSession(async (session: SessionContext, req: Request, res: Response) => {
      const preferences = userPreferencesSchema.safeParse(req.body);
      if (!preferences.success) {
        res.status(400).json({
          error: validationMessage(preferences.error),
          issues: preferences.error.issues,
        });
        return;
      }

      const outcome = await generatePackingList(endpoint, preferences.data);
      if (!outcome.ok) {
        console.log(
          `[API] Packing list generation failed for ${session.username}:`,
          outcome.failure.reason
        );
        res.status(502).json({ error: PACKING_LIST_ERROR, reason: outcome.failure.reason });
        return;
      }
      res.json({ packing_list: outcome.value });
    })
  );

  app.get(
    "/history",
    requireAuth,
    withSession(async (session: SessionContext, req: Request, res: Response) => {
      const user = await store.find(session.username);
      if (!user) {
        res.status(404).json({ error: "User not found" });
        return;
      }

      if (req.query.format === "markdown") {
        res.type("text/markdown").send(renderHistoryMarkdown(user.travel_history));
        return;
      }
      res.json({ history: user.travel_history });
    })
  );

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof DuplicateUserError) {
      res.status(409).json({ error: "Username already exists" });
      return;
    }
    if (error instanceof UnknownUserError) {
      res.status(404).json({ error: "User not found" });
      return;
    }
    if (error instanceof StoreFailure) {
      console.error("[STORE] Store failure:", error);
      res.status(503).json({ error: STORAGE_ERROR });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    const status = clientErrorStatus(error);
    if (status !== undefined && error instanceof Error) {
      res.status(status).json({ error: error.message });
      return;
    }
    console.error(`[API] Unhandled error on ${req.method} ${req.path}:`, error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
