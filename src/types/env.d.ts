declare namespace NodeJS {
  interface ProcessEnv {
    PORT?: string
    DATA_DIR?: string
    OLLAMA_HOST?: string
    SUMMARY_MODEL?: string
    SUMMARY_TIMEOUT_MS?: string
    SUMMARY_INPUT_LIMIT?: string
    DEV_LOG?: string
  }
}
