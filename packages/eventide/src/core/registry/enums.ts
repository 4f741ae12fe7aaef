export enum RegistryState {
    UNINITIALIZED = "uninitialized",
    ACTIVE = "active",
}

export enum DetachOutcome {
    /** No table exists; nothing was ever attached, or everything was detached. */
    UNINITIALIZED = "uninitialized",
    /** The observer is not in the category's list. */
    MISSING = "missing",
    REMOVED = "removed",
}
