/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_OCTOPRINT_HOST?: string;
    readonly VITE_OCTOPRINT_APIKEY?: string;
    readonly VITE_RESOLUTION?: string;
    readonly VITE_STYLE_PATH?: string;
    readonly VITE_WATCHDOG_URL?: string;
    readonly VITE_POLL_INTERVAL_MS?: string;
    readonly VITE_LOG_LEVEL?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
