/**
 * SALES REPORTER - The Coordinator
 *
 * The thin effectful shell around the pure pipeline:
 * 1. Read and decode both JSON documents (effects)
 * 2. Build the catalogue and aggregate the sales (pure)
 * 3. Print and persist the report (effects)
 *
 * Fatal conditions come back as a Left; skipped records are forwarded to
 * the diagnostic sink and also returned with the outcome.
 */

import {Catalogue, ReportMode, SalesSummary} from '../domain';
import {AppEffects} from './effects';
import {DocumentKind, FatalError, Warning} from './types';
import {aggregateSales, buildCatalogue} from './businessLogic';
import {formatReport} from './reportFormatting';
import {describeWarning, describeWriteFailure, errorCode, isPermissionError} from './diagnostics';
import {Either, Left, Right} from 'purify-ts';

export type SalesReportRequest = {
    readonly cataloguePath: string;
    readonly salesPath: string;
    readonly mode: ReportMode;
    readonly reportPath: string;
};

export type SalesReportOutcome = {
    readonly report: string;
    readonly summary: SalesSummary;
    readonly warnings: readonly Warning[];
    readonly reportPath: string;
    readonly saved: boolean;
};

type InputDocuments = {
    readonly products: readonly unknown[];
    readonly salesRecords: readonly unknown[];
};

type PricedDocuments = InputDocuments & {
    readonly catalogue: Catalogue;
    readonly catalogueWarnings: readonly Warning[];
};

/**
 * Produce the sales report for the given request.
 *
 * @return a function that runs the report against the given app effects,
 * returning either the fatal error that stopped the run or the outcome
 */
export function runSalesReport(
    request: SalesReportRequest
): (appEffects: AppEffects) => Either<FatalError, SalesReportOutcome> {
    return (appEffects: AppEffects) => {
        const startedAt = appEffects.clock.now();

        return fetchDocuments(request)(appEffects)
            .chain(documents => priceCatalogue(documents)(appEffects))
            .map(documents => {
                const {summary, warnings} = aggregateSales(documents.catalogue, documents.salesRecords);
                reportWarnings(warnings)(appEffects);
                const elapsedSeconds = (appEffects.clock.now() - startedAt) / 1000;
                return finaliseReport(
                    request,
                    summary,
                    [...documents.catalogueWarnings, ...warnings],
                    elapsedSeconds
                )(appEffects);
            });
    };
}

/**
 * Read both documents, the catalogue first. Either failure stops the run.
 */
function fetchDocuments(
    request: SalesReportRequest
): (appEffects: AppEffects) => Either<FatalError, InputDocuments> {
    return (appEffects: AppEffects) => loadDocument(request.cataloguePath, 'catalogue')(appEffects)
        .chain(products => loadDocument(request.salesPath, 'sales')(appEffects)
            .map(salesRecords => ({products, salesRecords})));
}

export function loadDocument(
    path: string,
    document: DocumentKind
): (appEffects: AppEffects) => Either<FatalError, readonly unknown[]> {
    return (appEffects: AppEffects) => Either.encase(() => appEffects.documents.readText(path))
        .mapLeft(error => toReadFailure(path, error))
        .chain(text => decodeJsonArray(path, document, text));
}

export function decodeJsonArray(
    path: string,
    document: DocumentKind,
    text: string
): Either<FatalError, readonly unknown[]> {
    return Either.encase((): unknown => JSON.parse(text))
        .mapLeft((error): FatalError => ({type: 'invalid_json', path, cause: error.message}))
        .chain((data): Either<FatalError, readonly unknown[]> =>
            Array.isArray(data) ? Right(data) : Left({type: 'not_an_array', path, document}));
}

function toReadFailure(path: string, error: Error): FatalError {
    if (errorCode(error) === 'ENOENT') {
        return {type: 'document_not_found', path};
    }
    if (isPermissionError(error)) {
        return {type: 'permission_denied', path};
    }
    return {type: 'unreadable_document', path, cause: error.message};
}

/**
 * Build the catalogue, reporting skipped products before deciding whether
 * anything usable is left.
 */
function priceCatalogue(
    documents: InputDocuments
): (appEffects: AppEffects) => Either<FatalError, PricedDocuments> {
    return (appEffects: AppEffects) => {
        const {catalogue, warnings} = buildCatalogue(documents.products);
        reportWarnings(warnings)(appEffects);

        return catalogue.size === 0
            ? Left({type: 'empty_catalogue'})
            : Right({...documents, catalogue, catalogueWarnings: warnings});
    };
}

function reportWarnings(warnings: readonly Warning[]): (appEffects: AppEffects) => void {
    return (appEffects: AppEffects) => {
        warnings.forEach(warning => appEffects.diagnostics.warn(describeWarning(warning)));
    };
}

/**
 * Print the report, then persist it. A failed write is reported but does
 * not fail the run: the report has already reached the console.
 */
function finaliseReport(
    request: SalesReportRequest,
    summary: SalesSummary,
    warnings: readonly Warning[],
    elapsedSeconds: number
): (appEffects: AppEffects) => SalesReportOutcome {
    return (appEffects: AppEffects) => {
        const report = formatReport(summary, elapsedSeconds, request.mode);
        appEffects.console.print(report);

        const saved = Either.encase(() => appEffects.reports.write(request.reportPath, `${report}\n`))
            .caseOf({
                Left: error => {
                    appEffects.diagnostics.error(describeWriteFailure(request.reportPath, error));
                    return false;
                },
                Right: () => {
                    appEffects.console.print(`\nResults saved to ${request.reportPath}`);
                    return true;
                },
            });

        return {report, summary, warnings, reportPath: request.reportPath, saved};
    };
}
