/**
 * Configuration interface for promptpane.
 *
 * Every option has a default in `defaultConfig`; a user config file only
 * needs to name the fields it overrides. Config files are JSON
 * (`promptpane.config.json`).
 */

/**
 * Main configuration interface.
 */
export interface IConfig {
  /**
   * Generative-language API endpoint.
   */
  api: IApiConfig;

  /**
   * Where the API key comes from.
   */
  credentials: ICredentialsConfig;

  /**
   * External process used to perform the HTTP request.
   */
  transport: ITransportConfig;

  /**
   * Loading spinner settings.
   */
  spinner: ISpinnerConfig;

  /**
   * Floating surface geometry, as fractions of the host's dimensions.
   */
  surface: ISurfaceConfig;

  /**
   * Keys bound on the result surface.
   */
  keymap: IKeymapConfig;

  /**
   * Persistent views created by the export action.
   */
  views: IViewsConfig;
}

export interface IApiConfig {
  /** Host name, without scheme. */
  host: string;

  /** API version path segment, e.g. 'v1beta'. */
  version: string;

  /** Model identifier, e.g. 'gemini-2.0-flash'. */
  model: string;
}

export interface ICredentialsConfig {
  /** Environment variable holding the API key. */
  envVar: string;
}

export interface ITransportConfig {
  /**
   * Executable that performs the request. It receives curl-compatible
   * arguments and the JSON body on stdin.
   */
  command: string;

  /**
   * Milliseconds before the request process is terminated.
   */
  timeout: number;

  /**
   * Milliseconds between SIGTERM and SIGKILL once the timeout fires.
   */
  killEscalationDelay: number;
}

export interface ISpinnerConfig {
  /** Milliseconds between frames. */
  interval: number;
}

export interface ISurfaceConfig {
  /** Width of the loading surface (0-1). Its height is always one line. */
  loadingWidthRatio: number;

  /** Width of the result surface (0-1). */
  resultWidthRatio: number;

  /** Height of the result surface (0-1). */
  resultHeightRatio: number;
}

export interface IKeymapConfig {
  close: string;
  export: string;
  showMeta: string;
}

export interface IViewsConfig {
  /** Directory exported views are written to, relative to the cwd. */
  directory: string;

  /** Open exported views in $VISUAL / $EDITOR. */
  openInEditor: boolean;
}

/**
 * Deep-partial form accepted from config files and CLI overrides.
 */
export type IUserConfig = {
  [K in keyof IConfig]?: Partial<IConfig[K]>;
};

/**
 * Default configuration.
 */
export const defaultConfig: IConfig = {
  api: {
    host: 'generativelanguage.googleapis.com',
    version: 'v1beta',
    model: 'gemini-2.0-flash',
  },
  credentials: {
    envVar: 'GEMINI_API_KEY',
  },
  transport: {
    command: 'curl',
    timeout: 120_000,
    killEscalationDelay: 5000,
  },
  spinner: {
    interval: 100,
  },
  surface: {
    loadingWidthRatio: 0.5,
    resultWidthRatio: 0.8,
    resultHeightRatio: 0.8,
  },
  keymap: {
    close: 'q',
    export: 't',
    showMeta: '?',
  },
  views: {
    directory: '.promptpane/views',
    openInEditor: true,
  },
};
