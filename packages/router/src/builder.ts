import { concatIdentifier, debug, isHelperName, isIdentifier, splitIdentifier, toSnakeCase } from "@liveroute/shared";
import { RouterError, RouterErrorCode } from "./errors.js";
import { assertRoutePath, joinPath } from "./paths.js";
import { RouteTable } from "./table.js";
import type {
  AddRouteOptions,
  GroupOptions,
  HttpVerb,
  Plug,
  ResolvedRouterOptions,
  RouteEntry,
  RouterOptions,
  ScopeOptions,
} from "./types.js";

export const DEFAULT_ROUTER_OPTIONS: ResolvedRouterOptions = {
  handlerSuffix: "Controller",
};

export function normalizeRouterOptions(options: RouterOptions | undefined): ResolvedRouterOptions {
  return {
    handlerSuffix: options?.handlerSuffix ?? DEFAULT_ROUTER_OPTIONS.handlerSuffix,
  };
}

/**
 * State of one open scope. The root scope is always at the bottom of the stack.
 */
interface ScopeFrame {
  readonly path: string;
  readonly alias: string | undefined;
  readonly as: string | undefined;
  readonly options: GroupOptions;
  readonly pipes: string[];
}

/** Plug constructors */
export function plug(name: string, options?: Readonly<Record<string, unknown>>): Plug {
  return options ? { kind: "plug", name, options } : { kind: "plug", name };
}

export function putLayout(view: string, template: string): Plug {
  return { kind: "put-layout", layout: [view, template] };
}

/**
 * Owned builder for one router definition.
 *
 * Routes are appended in declaration order. `build()` hands off an immutable
 * {@link RouteTable} and seals the builder.
 */
export class RouterBuilder {
  readonly namespace: string;
  readonly options: ResolvedRouterOptions;

  private readonly pipelines = new Map<string, readonly Plug[]>();
  private readonly scopes: ScopeFrame[];
  private readonly entries: RouteEntry[] = [];
  private sealed = false;

  constructor(namespace: string, options?: RouterOptions) {
    if (!isIdentifier(namespace)) {
      throw new RouterError(
        `router namespace must be a dotted identifier such as "MyAppWeb.Router", got: ${JSON.stringify(namespace)}`,
        RouterErrorCode.INVALID_NAMESPACE,
      );
    }
    this.namespace = namespace;
    this.options = normalizeRouterOptions(options);
    this.scopes = [{ path: "/", alias: undefined, as: undefined, options: {}, pipes: [] }];
  }

  /**
   * Declare a named pipeline.
   */
  pipeline(name: string, plugs: readonly Plug[]): this {
    this.assertOpen();
    if (this.pipelines.has(name)) {
      throw new RouterError(`pipeline ${name} is already defined`, RouterErrorCode.DUPLICATE_PIPELINE);
    }
    this.pipelines.set(name, Object.freeze([...plugs]));
    return this;
  }

  /**
   * Pipe routes of the current scope through the named pipelines.
   */
  pipeThrough(names: string | readonly string[]): this {
    this.assertOpen();
    const list = typeof names === "string" ? [names] : names;
    for (const name of list) {
      if (!this.pipelines.has(name)) {
        throw new RouterError(
          `unknown pipeline ${name}; declare it with pipeline() before piping through it`,
          RouterErrorCode.UNKNOWN_PIPELINE,
        );
      }
    }
    this.current().pipes.push(...list);
    return this;
  }

  /**
   * Open a nested scope. The second argument is either an alias namespace or
   * a full set of scope options.
   */
  scope(path: string, aliasOrOptions: string | ScopeOptions, body: (router: this) => void): this {
    this.assertOpen();
    assertRoutePath(path);

    const options: ScopeOptions = typeof aliasOrOptions === "string"
      ? { alias: aliasOrOptions }
      : aliasOrOptions;
    if (options.alias !== undefined && !isIdentifier(options.alias)) {
      throw new RouterError(
        `scope alias must be a dotted identifier, got: ${JSON.stringify(options.alias)}`,
        RouterErrorCode.INVALID_NAMESPACE,
      );
    }

    const parent = this.current();
    const { alias, as, ...group } = options;
    const frame: ScopeFrame = {
      path: joinPath(parent.path, path),
      alias: alias === undefined ? parent.alias : concatIdentifier(parent.alias ?? "", alias),
      as: as === undefined ? parent.as : joinHelper(parent.as, as),
      options: group,
      pipes: [],
    };

    debug.router("scope.enter", { path: frame.path, alias: frame.alias, as: frame.as });
    this.scopes.push(frame);
    try {
      body(this);
    } finally {
      this.scopes.pop();
    }
    return this;
  }

  /**
   * Qualify a reference with the alias chain of the current scope.
   */
  scopedAlias(reference: string): string {
    const alias = this.current().alias;
    return alias ? concatIdentifier(alias, reference) : reference;
  }

  /**
   * Group-level options in effect for the current scope.
   *
   * Scopes resolve outermost to innermost: each frame applies the layouts of
   * the pipelines piped through in it, then its own options. Session maps are
   * merged key by key.
   */
  inheritedOptions(): GroupOptions {
    let layout: GroupOptions["layout"];
    let session: Record<string, unknown> | undefined;
    let container: GroupOptions["container"];
    for (const frame of this.scopes) {
      for (const name of frame.pipes) {
        for (const step of this.pipelines.get(name) ?? []) {
          if (step.kind === "put-layout") layout = step.layout;
        }
      }
      if (frame.options.layout) layout = frame.options.layout;
      if (frame.options.container) container = frame.options.container;
      if (frame.options.session) session = { ...session, ...frame.options.session };
    }

    return {
      ...(layout ? { layout } : {}),
      ...(session ? { session } : {}),
      ...(container ? { container } : {}),
    };
  }

  /**
   * Generic route primitive. Every route of the table is registered here.
   */
  addRoute(
    verb: HttpVerb,
    path: string,
    handler: string,
    action: string,
    options: AddRouteOptions = {},
  ): RouteEntry {
    this.assertOpen();
    assertRoutePath(path);

    const scope = this.current();
    const qualified = options.alias === false ? handler : this.scopedAlias(handler);
    const helper = joinHelper(scope.as, options.as ?? this.inferHelper(handler));

    const entry: RouteEntry = Object.freeze({
      verb,
      path: joinPath(scope.path, path),
      handler: qualified,
      action,
      helper,
      pipeThrough: Object.freeze(this.currentPipes()),
      private: Object.freeze({ ...options.private }),
      metadata: Object.freeze({ ...options.metadata }),
    });

    debug.router("route.added", { verb, path: entry.path, handler: qualified, action, helper });
    this.entries.push(entry);
    return entry;
  }

  get(path: string, handler: string, action: string, options?: AddRouteOptions): RouteEntry {
    return this.addRoute("GET", path, handler, action, options);
  }

  post(path: string, handler: string, action: string, options?: AddRouteOptions): RouteEntry {
    return this.addRoute("POST", path, handler, action, options);
  }

  /**
   * Seal the builder and hand off the finished table.
   */
  build(): RouteTable {
    this.assertOpen();
    this.sealed = true;
    debug.router("table.built", { namespace: this.namespace, routes: this.entries.length });
    return new RouteTable(this.namespace, this.entries);
  }

  private current(): ScopeFrame {
    const frame = this.scopes[this.scopes.length - 1];
    if (!frame) throw new Error("router scope stack is empty");
    return frame;
  }

  private currentPipes(): string[] {
    return this.scopes.flatMap((frame) => frame.pipes);
  }

  /**
   * "MyAppWeb.PageController" → "page"
   */
  private inferHelper(handler: string): string {
    const last = splitIdentifier(handler).at(-1) ?? handler;
    const suffix = this.options.handlerSuffix;
    const base = suffix && last.endsWith(suffix) && last !== suffix
      ? last.slice(0, -suffix.length)
      : last;
    return toSnakeCase(base);
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new RouterError(
        `router ${this.namespace} has already been built; define a new router to add routes`,
        RouterErrorCode.SEALED,
      );
    }
  }
}

function joinHelper(prefix: string | undefined, name: string): string {
  if (!isHelperName(name)) {
    throw new RouterError(`helper names must be snake_case, got: ${JSON.stringify(name)}`, RouterErrorCode.INVALID_HELPER);
  }
  return prefix ? `${prefix}_${name}` : name;
}

/**
 * Define a router in one call and return its finished table.
 */
export function defineRouter(
  namespace: string,
  body: (router: RouterBuilder) => void,
  options?: RouterOptions,
): RouteTable {
  const router = new RouterBuilder(namespace, options);
  body(router);
  return router.build();
}
