import type { AxiosInstance, AxiosRequestConfig } from "axios";
import { CAMPUS_API } from "../config/service-config.ts";
import { CONTENT_TYPES } from "../config/validation-config.ts";
import type { ApiConfig, RuntimeConfig } from "../runtime/base.ts";
import type {
  GoogleAuthRequestBody,
  LoginCredentials,
  Registration,
  RegistrationRequestBody,
  SessionProvider,
  User,
} from "../types.ts";
import { ApiError, toApiError } from "../utils/api-error-util.ts";
import { normalizeUser } from "../utils/event-normalizer-util.ts";
import {
  accessTokenSchema,
  parseWithSchema,
  userRecordSchema,
} from "../validation/api-response-validation.ts";
import { createBearerHeader } from "../validation/auth-validation.ts";
import { createHttpClient } from "./events-api-service.ts";
import {
  resolveComponentLogger,
  type ServiceLogger,
} from "./logger-service.ts";

export interface SessionSnapshot {
  user: User | null;
  signedIn: boolean;
}

export type SessionListener = (session: SessionSnapshot) => void;

export interface SessionService extends SessionProvider {
  login(credentials: LoginCredentials): Promise<User>;
  loginWithGoogle(idToken: string): Promise<User>;
  /** Creates the account, then signs in with the same credentials */
  register(registration: Registration): Promise<User>;
  fetchCurrentUser(): Promise<User>;
  logout(): void;
  getCurrentUser(): User | null;
  subscribe(listener: SessionListener): () => void;
}

export interface SessionServiceOptions {
  http?: AxiosInstance;
  config?: ApiConfig;
  logger?: ServiceLogger;
  /** Gates debug output when no logger is given */
  runtime?: Pick<RuntimeConfig, "logDebug">;
  /** Token restored by the host app, if it keeps one */
  initialToken?: string | null;
}

const PASSWORD_GRANT = "password";

/**
 * Holds the bearer token for the current user. Token exchange goes through
 * the OAuth2 password grant or a Google ID token.
 */
export function createSessionService(
  options: SessionServiceOptions = {},
): SessionService {
  const http = options.http ?? createHttpClient(options.config);
  const logger = resolveComponentLogger(
    "session",
    options.logger,
    options.runtime,
  );
  const { TOKEN, GOOGLE_AUTH, REGISTER, CURRENT_USER } = CAMPUS_API.PATHS;
  const listeners = new Set<SessionListener>();

  let accessToken: string | null = options.initialToken || null;
  let currentUser: User | null = null;

  const notify = () => {
    const snapshot: SessionSnapshot = {
      user: currentUser,
      signedIn: accessToken !== null,
    };
    for (const listener of listeners) {
      listener(snapshot);
    }
  };

  const send = async (
    config: AxiosRequestConfig,
    action: string,
  ): Promise<unknown> => {
    try {
      const response = await http.request<unknown>(config);
      return response.data;
    } catch (error) {
      const apiError = toApiError(error);
      logger.error(`Failed to ${action}`, apiError, {
        url: config.url,
        status: apiError.status,
        code: apiError.code,
      });
      throw apiError;
    }
  };

  const readToken = (payload: unknown, source: string): string => {
    const parsed = parseWithSchema(accessTokenSchema, payload);
    if (!parsed.success) {
      throw new ApiError(
        "invalid_response",
        `Unexpected token payload from ${source}`,
        { detail: parsed.errors.join("; ") },
      );
    }
    return parsed.data.access_token;
  };

  const fetchCurrentUser = async (): Promise<User> => {
    if (!accessToken) {
      throw new ApiError("unauthorized", "No active session");
    }

    const payload = await send({
      method: "GET",
      url: CURRENT_USER,
      headers: { Authorization: createBearerHeader(accessToken) },
    }, "load the current user");

    const parsed = parseWithSchema(userRecordSchema, payload);
    if (!parsed.success) {
      throw new ApiError(
        "invalid_response",
        `Unexpected user payload from ${CURRENT_USER}`,
        { detail: parsed.errors.join("; ") },
      );
    }

    currentUser = normalizeUser(parsed.data);
    notify();
    return currentUser;
  };

  const startSession = async (token: string, method: string): Promise<User> => {
    accessToken = token;
    try {
      const user = await fetchCurrentUser();
      logger.info("Signed in", { userId: user.id, method });
      return user;
    } catch (error) {
      // a token we cannot resolve to a user is not a session
      accessToken = null;
      currentUser = null;
      notify();
      throw error;
    }
  };

  const login = async (credentials: LoginCredentials): Promise<User> => {
    const form = new URLSearchParams({
      username: credentials.email.trim(),
      password: credentials.password,
      grant_type: PASSWORD_GRANT,
    });

    const payload = await send({
      method: "POST",
      url: TOKEN,
      data: form.toString(),
      headers: {
        "Content-Type": CONTENT_TYPES.APPLICATION_X_WWW_FORM_URLENCODED,
      },
    }, "sign in");

    return startSession(readToken(payload, TOKEN), "password");
  };

  return {
    getAccessToken() {
      return accessToken;
    },

    isSignedIn() {
      return accessToken !== null;
    },

    getCurrentUser() {
      return currentUser;
    },

    fetchCurrentUser,

    login,

    async loginWithGoogle(idToken) {
      const body: GoogleAuthRequestBody = { id_token: idToken };
      const payload = await send({
        method: "POST",
        url: GOOGLE_AUTH,
        data: body,
      }, "sign in with Google");

      return startSession(readToken(payload, GOOGLE_AUTH), "google");
    },

    async register(registration) {
      const body: RegistrationRequestBody = {
        email: registration.email.trim(),
        name: registration.name.trim(),
        password: registration.password,
      };

      const payload = await send({
        method: "POST",
        url: REGISTER,
        data: body,
      }, "register");

      const created = parseWithSchema(userRecordSchema, payload);
      if (!created.success) {
        throw new ApiError(
          "invalid_response",
          `Unexpected user payload from ${REGISTER}`,
          { detail: created.errors.join("; ") },
        );
      }
      logger.info("Account registered", { userId: created.data.id });

      return login({
        email: registration.email,
        password: registration.password,
      });
    },

    logout() {
      if (accessToken === null && currentUser === null) return;
      accessToken = null;
      currentUser = null;
      logger.info("Signed out");
      notify();
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
