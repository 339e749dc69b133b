/**
 * Scene Errors
 *
 * Contract violations raised synchronously at the call site. The core never
 * catches these; they surface to whoever broke the contract.
 */

/**
 * Base class for every error thrown by the scene core.
 */
export class SceneError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

// ============================================
// Structural
// ============================================

/** Self-parenting, re-parenting an attached node, or creating a cycle */
export class InvalidChildError extends SceneError {}

/** A sibling with the same name already exists */
export class DuplicatedChildError extends InvalidChildError {}

export class EmptyNameError extends SceneError {
    constructor() {
        super('Node name must not be empty');
    }
}

export class NotAChildError extends SceneError {}

// ============================================
// Signals
// ============================================

export class SignalNotOwnerError extends SceneError {}

export class AlreadyConnectedError extends SceneError {}

export class NotConnectedError extends SceneError {}

// ============================================
// Groups
// ============================================

export class AlreadyInGroupError extends SceneError {}
