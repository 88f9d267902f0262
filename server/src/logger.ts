export type LogFn = (message: string) => void;

let sink: LogFn = (message: string) => console.log(message);

// Replaces the output sink and hands back the previous one
export const setLogger = (logger: LogFn): LogFn => {
    const previous = sink;
    sink = logger;
    return previous;
};

// Tagged logger, e.g. createLogger('FORECAST')('done') -> "[FORECAST] done"
export const createLogger = (tag: string): LogFn => {
    return (message: string) => sink(`[${tag}] ${message}`);
};
