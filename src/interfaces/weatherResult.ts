import { WeatherRecord } from './weatherRecord';

export type TransportFailure = {
    kind: 'TransportFailure';
    reason: 'timeout' | 'network';
    message: string;
};

export type HttpError = {
    kind: 'HttpError';
    status: number;
    message: string;
};

export type MalformedResponse = {
    kind: 'MalformedResponse';
    message: string;
    issues?: string[];
};

export type WeatherError = TransportFailure | HttpError | MalformedResponse;

export type WeatherResult =
    | {
        status: 'success';
        data: WeatherRecord;
    }
    | {
        status: 'error';
        error: WeatherError;
    };
