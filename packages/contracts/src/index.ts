export * from "./schema/qc_flag_v1";
export * from "./schema/time_series_v1";
export * from "./schema/station_metadata_v1";
export * from "./schema/param_qc_config_v1";
export * from "./schema/propagation_rule_v1";
export * from "./schema/qc_notice_v1";
export * from "./schema/qc_report_v1";
export * from "./schema/short_term_v1";
