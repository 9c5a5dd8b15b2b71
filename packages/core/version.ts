/** Version reported to tracers and meters */
export const TABULA_VERSION = "0.1.0"
