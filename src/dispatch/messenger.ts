/**
 * Method messenger -- calls standard methods on other actors by name.
 *
 * The host runtime owns delivery; the messenger only turns the method name
 * into its selector and hands the call over.
 */

import { IllegalMethodNameError, MessengerSendError } from './errors.js';
import { defaultHasher, type Hasher } from './hasher.js';
import { isConventionalMethodName } from './naming.js';
import { methodNumber } from './reservation.js';
import type { MethodNumber } from './types.js';

/**
 * Host capability for sending a message to another actor.
 * Resolves with the callee's raw return bytes.
 */
export interface SendCapability {
    send(to: string, selector: MethodNumber, parameters: Uint8Array): Promise<Uint8Array>;
}

export class MethodMessenger {
    constructor(
        private readonly host: SendCapability,
        private readonly hasher: Hasher = defaultHasher,
    ) { }

    /**
     * Call a method by name on the actor at `to`.
     *
     * Only conventional (PascalCase) names are accepted. Name problems reject
     * with a BuildError before anything is sent; a failed delivery rejects
     * with MessengerSendError wrapping the host's error.
     */
    async callMethod(to: string, method: string, parameters: Uint8Array = new Uint8Array(0)): Promise<Uint8Array> {
        if (method.length > 0 && !isConventionalMethodName(method)) {
            throw new IllegalMethodNameError(method);
        }
        const selector = methodNumber(method, this.hasher);
        try {
            return await this.host.send(to, selector, parameters);
        } catch (err) {
            throw new MessengerSendError(method, selector, err);
        }
    }
}
