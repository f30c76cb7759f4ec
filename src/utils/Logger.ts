import winston, { Logger } from "winston";

const logFormat = winston.format.printf(({ level, message, label, timestamp }) => {
    return `${timestamp} [${label}] ${level}: ${message}`;
});

export function createLogger(label: string): Logger {
    return winston.createLogger({
        level: process.env.LOG_LEVEL ?? "info",
        silent: process.env.LOG_SILENT === "true",
        format: winston.format.combine(
            winston.format.label({ label: label }),
            winston.format.timestamp(),
            logFormat
        ),
        transports: [
            new winston.transports.Console({
                stderrLevels: ["error", "warn", "info", "verbose", "debug", "silly"]
            })
        ]
    });
}
