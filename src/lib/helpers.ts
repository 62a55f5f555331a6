import { Types } from 'mongoose';

class Helpers {
    /**
     * Convert a string id to an ObjectId, or null when it is not one
     */
    toObjectId(id: string): Types.ObjectId | null {
        if (!Types.ObjectId.isValid(id) || id.length !== 24) {
            return null;
        }
        return Types.ObjectId.createFromHexString(id);
    }

    truncate(text: string, maxLength: number, suffix = '...'): string {
        return text.length > maxLength
            ? text.slice(0, maxLength) + suffix
            : text;
    }

    errorMessage(error: unknown): string {
        return error instanceof Error ? error.message : String(error);
    }

    sleep(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

export default new Helpers();
