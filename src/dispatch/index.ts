export { defineActor, type Actor, type ActorDefinition } from './actor.js';
export { dispatch, Dispatcher } from './dispatcher.js';
export {
    BuildError,
    DuplicateSelectorError,
    EmptyMethodNameError,
    IllegalMethodNameError,
    IndeterminableSelectorError,
    MalformedRegistrationError,
    MessengerSendError,
    RegistryFrozenError,
    ReservedNumberMisuseError,
} from './errors.js';
export { Blake2bHasher, candidate, CANDIDATE_BYTES, defaultHasher, digest, type Hasher } from './hasher.js';
export { MethodMessenger, type SendCapability } from './messenger.js';
export { isConventionalMethodName, toMethodName } from './naming.js';
export { buildMethodTable, MethodRegistry, type BuildOptions } from './registry.js';
export {
    FIRST_AVAILABLE,
    formatMethodNumber,
    isPermittedExplicit,
    MAX_METHOD_NUMBER,
    METHOD_CONSTRUCTOR,
    METHOD_SEND,
    methodNumber,
    normalize,
    RESERVATION_POLICY,
    toMethodNumber,
    type ReservationPolicy,
} from './reservation.js';
export { MethodTable } from './table.js';
export type {
    DispatchError,
    DispatchRequest,
    DispatchResult,
    ExplicitRegistration,
    HandlerResult,
    MethodEntry,
    MethodHandler,
    MethodNumber,
    MethodRegistration,
    NamedRegistration,
} from './types.js';
