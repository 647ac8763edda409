/**
 * Pipeline stage contract.
 *
 * A stage looks at a request and decides, synchronously, whether to let it
 * through untouched, answer it itself, or let it through and edit the
 * response that comes back. Only responders suspend.
 *
 * @packageDocumentation
 */

/**
 * Anything that turns a request into a response: the file responder, a
 * fallback, or a whole pipeline.
 */
export type Responder = (request: Request) => Promise<Response>;

/**
 * What a stage wants done with a request.
 */
export type StageDecision =
    /** Forward to the next stage unchanged. */
    | { kind: 'pass' }
    /** Answer without consulting later stages. */
    | { kind: 'respond'; respond: Responder }
    /** Forward, then rewrite the response that comes back. */
    | { kind: 'transform'; transform: (response: Response) => Response };

/**
 * One step of the request pipeline.
 */
export interface PipelineStage {
    /** Used in log output. */
    readonly name: string;

    decide(request: Request): StageDecision;
}

export const PASS: StageDecision = Object.freeze({ kind: 'pass' });

/**
 * Short-circuit decision with a fixed response.
 */
export function respondWith(response: Response): StageDecision {
    return { kind: 'respond', respond: async () => response };
}

/**
 * Runs `request` through `stages` in order, ending at `responder`.
 */
export async function runStages(
    stages: readonly PipelineStage[],
    responder: Responder,
    request: Request,
    index = 0,
): Promise<Response> {
    if (index === stages.length) {
        return responder(request);
    }

    const decision = stages[index].decide(request);
    switch (decision.kind) {
        case 'pass':
            return runStages(stages, responder, request, index + 1);
        case 'respond':
            return decision.respond(request);
        case 'transform': {
            const response = await runStages(
                stages,
                responder,
                request,
                index + 1,
            );
            return decision.transform(response);
        }
    }
}

/**
 * Copies a response so its headers can be edited, keeping the body stream.
 *
 * The body is handed over as-is, never read or buffered.
 */
export function withEditableHeaders(
    response: Response,
    edit: (headers: Headers) => void,
): Response {
    const headers = new Headers(response.headers);
    edit(headers);
    return new Response(response.body, {
        status: response.status,
        statusText: response.statusText,
        headers,
    });
}

/**
 * A response with no body.
 */
export function emptyResponse(
    status: number,
    headers?: Record<string, string>,
): Response {
    return new Response(null, { status, headers });
}
