import { isHelperName, isIdentifier } from "@liveroute/shared";
import { LiveRouteError, LiveRouteErrorCode } from "../model/errors.js";
import type { LiveRouteOptions } from "../model/route.js";

const KNOWN_OPTIONS: readonly string[] = ["session", "layout", "container", "as"];

const TAG_PATTERN = /^[a-z][a-z0-9-]*$/;

function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function invalid(message: string, view: string): LiveRouteError {
  return new LiveRouteError(message, LiveRouteErrorCode.INVALID_OPTION, view);
}

/**
 * Check a declared view reference.
 */
export function validateView(view: string): void {
  if (!isIdentifier(view)) {
    throw new LiveRouteError(
      `live view must be a dotted identifier such as "ArticleLive.Index", got: ${JSON.stringify(view)}`,
      LiveRouteErrorCode.INVALID_VIEW,
      view,
    );
  }
}

/**
 * Check a declared action tag.
 */
export function validateAction(action: string, view: string): void {
  if (!isHelperName(action)) {
    throw new LiveRouteError(
      `live action for ${view} must be a snake_case tag such as "index" or "edit", got: ${JSON.stringify(action)}`,
      LiveRouteErrorCode.INVALID_ACTION,
      view,
    );
  }
}

/**
 * Check the options of a live route statement.
 *
 * Options come from user code that may not be type-checked, so every key is
 * inspected at runtime.
 */
export function validateLiveRouteOptions(options: LiveRouteOptions, view: string): void {
  if (!isPlainObject(options)) {
    throw invalid(`options for ${view} must be a plain object`, view);
  }

  const unknown = Object.keys(options).filter((key) => !KNOWN_OPTIONS.includes(key));
  if (unknown.length > 0) {
    throw invalid(
      `unknown option(s) for ${view}: ${unknown.join(", ")}; expected one of ${KNOWN_OPTIONS.join(", ")}`,
      view,
    );
  }

  const { session, layout, container, as } = options;

  if (session !== undefined && !isPlainObject(session)) {
    throw invalid(`session for ${view} must be a map of string keys to values`, view);
  }

  if (layout !== undefined) {
    const [layoutView, template] = Array.isArray(layout) && layout.length === 2 ? layout : [undefined, undefined];
    if (typeof layoutView !== "string" || !isIdentifier(layoutView) || typeof template !== "string" || !template) {
      throw invalid(
        `layout for ${view} must be a [view, template] pair such as ["MyAppWeb.LayoutView", "app"]`,
        view,
      );
    }
  }

  if (container !== undefined) {
    const [tag, attributes] = Array.isArray(container) && container.length === 2 ? container : [undefined, undefined];
    if (typeof tag !== "string" || !TAG_PATTERN.test(tag)) {
      throw invalid(`container for ${view} must start with an HTML tag name such as "div"`, view);
    }
    if (!isPlainObject(attributes) || !Object.values(attributes).every((v) => typeof v === "string")) {
      throw invalid(`container attributes for ${view} must map attribute names to strings`, view);
    }
  }

  if (as !== undefined && (typeof as !== "string" || !isHelperName(as))) {
    throw invalid(`"as" for ${view} must be a snake_case helper name, got: ${JSON.stringify(as)}`, view);
  }
}
