import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize Sentry. Call once at startup, before the listeners bind.
 * A missing or empty DSN leaves Sentry disabled and every capture a no-op.
 */
export function initSentry(dsn: string | undefined, environment = process.env.NODE_ENV ?? "production"): void {
  enabled = false;
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    // Upstream URLs can carry tokens in their query strings
    beforeBreadcrumb(breadcrumb) {
      const url = breadcrumb.data?.url;
      if (breadcrumb.category === "http" && typeof url === "string" && URL.canParse(url)) {
        const parsed = new URL(url);
        parsed.search = "";
        return { ...breadcrumb, data: { ...breadcrumb.data, url: parsed.toString() } };
      }
      return breadcrumb;
    },
  });
  enabled = true;
}

export interface ErrorContext {
  route?: string;
  target?: string;
  source?: string;
  extra?: Record<string, unknown>;
}

/** Capture an exception tagged with the proxy route or upstream it concerns. */
export function captureError(error: unknown, context?: ErrorContext): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.route && { route: context.route }),
      ...(context?.target && { target: context.target }),
      ...(context?.source && { source: context.source }),
    },
    extra: context?.extra,
  });
}

