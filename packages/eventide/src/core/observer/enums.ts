export enum ObserverStatus {
    CREATED = "created",
    ACTIVE = "active",
    DESTROYED = "destroyed",
}
