import crypto from "crypto";
import { v4 as uuidv4 } from "uuid";

/** Identifier for elections, races and candidates. */
export function newId() {
    return uuidv4();
}

/**
 * Generate a short casual ID (alphanumeric), used for audit entries.
 * Default length 8.
 */
export function shortId(length = 8) {
    const bytes = crypto.randomBytes(Math.ceil(length * 1.5)).toString("base64");
    const clean = bytes.replace(/[^A-Za-z0-9]/g, "");
    return clean.slice(0, length);
}
