import { parse as parseCSV } from "csv-parse";
import { createReadStream } from "fs";
import path from "path";
import { isHallCode, type DiningSources, type GymSource, type HallCode, type HallSource } from "./types";

const readRows = async (filePath: string): Promise<string[][]> => {
    const rows: string[][] = [];

    return new Promise((resolve, reject) => {
        createReadStream(filePath)
            .pipe(parseCSV({ delimiter: ",", from_line: 2, trim: true, skip_empty_lines: true }))
            .on("data", (row: string[]) => {
                rows.push(row);
            })
            .on("end", () => {
                resolve(rows);
            })
            .on("error", (error) => {
                reject(error);
            });
    });
};

/**
 * halls.csv: code,name,menu_url,activity_url
 */
export const readHallsFromCSV = async (filePath: string): Promise<HallSource[]> => {
    const halls: HallSource[] = [];

    for (const [code = "", name = "", menuUrl = "", activityUrl = ""] of await readRows(filePath)) {
        if (!isHallCode(code)) {
            console.warn(`[Sources] Skipping unknown hall code "${code}" in ${filePath}`);
            continue;
        }
        halls.push({ code, name, menuUrl, activityUrl });
    }

    return halls;
};

/**
 * hall-aliases.csv: name,code
 * Maps the location names printed in the hours table to hall codes.
 */
export const readHallAliasesFromCSV = async (filePath: string): Promise<Map<string, HallCode>> => {
    const aliases = new Map<string, HallCode>();

    for (const [name = "", code = ""] of await readRows(filePath)) {
        if (!isHallCode(code)) {
            console.warn(`[Sources] Alias "${name}" points at unknown hall code "${code}"`);
            continue;
        }
        aliases.set(name, code);
    }

    return aliases;
};

/**
 * gyms.csv: code,facility_name
 */
export const readGymsFromCSV = async (filePath: string): Promise<GymSource[]> => {
    const rows = await readRows(filePath);
    return rows.map(([code = "", facilityName = ""]) => ({ code, facilityName }));
};

export async function loadSources(dir: string): Promise<DiningSources> {
    const [halls, aliases, gyms] = await Promise.all([
        readHallsFromCSV(path.join(dir, "halls.csv")),
        readHallAliasesFromCSV(path.join(dir, "hall-aliases.csv")),
        readGymsFromCSV(path.join(dir, "gyms.csv")),
    ]);

    return { halls, aliases, gyms };
}
