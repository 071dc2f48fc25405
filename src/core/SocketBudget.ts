import { buildConnector } from 'undici';
import { ConcurrencyGate } from './ConcurrencyGate.js';

/**
 * Wrap undici's connector so every socket holds a permit of `budget` from
 * connect until close. One budget spans all origins of an Agent, so idle
 * keep-alive sockets count against the same limit as busy ones.
 */
export function budgetedConnector(
    budget: ConcurrencyGate,
    connect: buildConnector.connector = buildConnector({})
): buildConnector.connector {
    return (options, callback) => {
        budget.acquire().then(
            () => {
                connect(options, (...[error, socket]: Parameters<buildConnector.Callback>) => {
                    if (error !== null || socket === null) {
                        budget.release();
                        callback(error ?? new Error('Connector returned no socket'), null);
                        return;
                    }
                    socket.once('close', () => budget.release());
                    callback(null, socket);
                });
            },
            (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)), null)
        );
    };
}
