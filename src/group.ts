export type GroupType = "train" | "val" | "test";

/** partition order of the output layout and of the index cut points */
export const group_types = ["train", "val", "test"] satisfies Array<GroupType>;

export type GroupRatio = Record<GroupType, number>;

export type GroupCounts = Record<GroupType, number>;
