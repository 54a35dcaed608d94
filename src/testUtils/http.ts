import {Request, Response} from "express";
import {EventEmitter} from "node:events";
import {Readable} from "node:stream";

export interface ResponseDouble {
    status: jest.Mock;
    json: jest.Mock;
    send: jest.Mock;
    set: jest.Mock;
    type: jest.Mock;
    attachment: jest.Mock;
    writeHead: jest.Mock;
    write: jest.Mock;
    end: jest.Mock;
}

/**
 * Chainable stand-in for the parts of express's Response the controllers use
 */
export const responseDouble = (): { res: Response; double: ResponseDouble } => {
    const double: ResponseDouble = {
        status: jest.fn(),
        json: jest.fn(),
        send: jest.fn(),
        set: jest.fn(),
        type: jest.fn(),
        attachment: jest.fn(),
        writeHead: jest.fn(),
        write: jest.fn(),
        end: jest.fn(),
    };
    for (const mock of Object.values(double)) {
        mock.mockReturnValue(double);
    }
    return {res: double as unknown as Response, double};
};

export const requestDouble = (fields: Partial<Request>): Request => fields as Request;

/**
 * Request whose connection events ('close', 'error') the test emits itself
 */
export const connectedRequestDouble = (fields: Partial<Request>): { req: Request; connection: EventEmitter } => {
    const connection = new EventEmitter();
    return {req: Object.assign(connection, fields) as unknown as Request, connection};
};

/**
 * Payloads of the server-sent event frames written so far
 */
export const sentEvents = (double: ResponseDouble): unknown[] =>
    double.write.mock.calls.map(([frame]: [string]) => JSON.parse(frame.replace(/^data: /, "")));

export const uploadedFile = (originalname: string, buffer: Buffer, mimetype = "image/png"): Express.Multer.File => ({
    fieldname: "images",
    originalname,
    encoding: "7bit",
    mimetype,
    size: buffer.length,
    buffer,
    destination: "",
    filename: "",
    path: "",
    stream: Readable.from([]),
});
