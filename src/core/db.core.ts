import mongoose from "mongoose";
import { envConfig } from "@/config/index.js";

export default class DBCore {
    private static instance: DBCore;
    private constructor() {}

    public static getInstance(): DBCore {
        if (!DBCore.instance) {
            DBCore.instance = new DBCore();
        }
        return DBCore.instance;
    }

    public connect(): Promise<void> {
        return mongoose.connect(envConfig.MONGODB_URI).then(() => {
            console.log("[DB] Connected to MongoDB");
        }).catch((err: unknown) => {
            console.error("[DB] Error connecting to MongoDB", err);
        });
    }

    public disconnect(): Promise<void> {
        return mongoose.disconnect();
    }
}
