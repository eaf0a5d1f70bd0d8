/**
 * Error types for aenv
 */

export type ProfileErrorKind =
    | "EmptyRequiredInput"
    | "UnresolvedIdentifier"
    | "UnknownProfile"
    | "MissingToken"
    | "StoreUnreadable";

export class ProfileError extends Error {
    constructor(message: string, public readonly kind: ProfileErrorKind) {
        super(message);
        this.name = "ProfileError";
        Object.setPrototypeOf(this, ProfileError.prototype);
    }
}

export function isProfileError(err: unknown, kind?: ProfileErrorKind): err is ProfileError {
    if (!(err instanceof ProfileError)) return false;
    return kind === undefined || err.kind === kind;
}

export function getErrorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
