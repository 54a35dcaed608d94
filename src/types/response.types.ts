export interface ApiResponse<T = unknown> {
    success: boolean;
    message: string;
    data?: T;
    error?: string;
}

export interface ErrorResponse {
    success: false;
    error: string;
    details?: string;
    timestamp: string;
}
