export class ResponseError extends Error {
    public readonly statusCode: number;

    constructor(statusCode: number, message: string) {
        super(message);
        this.name = "ResponseError";
        this.statusCode = statusCode;
    }
}
