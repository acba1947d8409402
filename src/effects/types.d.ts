// ============================================================================
// Configuration
// ============================================================================

export type SalesReportConfig = {
    readonly reportFile: string;
    readonly encoding: BufferEncoding;
}
