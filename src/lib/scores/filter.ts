import type { FilterOption, GameRecord } from "@/types/scores";

export const FILTER_OPTIONS: readonly FilterOption[] = ["All", "Live", "Scheduled", "Final"];

export const isFilterOption = (value: string): value is FilterOption =>
    (FILTER_OPTIONS as readonly string[]).includes(value);

/** `All` hands back the input as-is; other options keep matching statuses in order. */
export function filterGames(records: readonly GameRecord[], option: FilterOption): readonly GameRecord[] {
    if (option === "All") return records;
    return records.filter((record) => record.status === option);
}
