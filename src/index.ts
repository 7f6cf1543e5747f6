export * from "./cse"
export * from "./cse/address"
export * from "./cse/config"
export * from "./cse/discovery"
export * from "./cse/dispatcher"
export * from "./cse/event"
export * from "./cse/lock"
export * from "./cse/registration"
export * from "./cse/remote"
export * from "./cse/result_tree"
export * from "./cse/security"
export * from "./cse/storage"
export * from "./cse/resources/acp"
export * from "./cse/resources/ae"
export * from "./cse/resources/cin"
export * from "./cse/resources/cnt"
export * from "./cse/resources/cnt_la_ol"
export * from "./cse/resources/cse_base"
export * from "./cse/resources/csr"
export * from "./cse/resources/factory"
export * from "./cse/resources/grp"
export * from "./cse/resources/grp_fopt"
export * from "./cse/resources/resource"
export * from "./cse/resources/sub"
export * from "./onem2m/m2m_acp"
export * from "./onem2m/m2m_ae"
export * from "./onem2m/m2m_base"
export * from "./onem2m/m2m_cb"
export * from "./onem2m/m2m_cin"
export * from "./onem2m/m2m_cnt"
export * from "./onem2m/m2m_csr"
export * from "./onem2m/m2m_grp"
export * from "./onem2m/m2m_header"
export * from "./onem2m/m2m_protocol"
export * from "./onem2m/m2m_rsp"
export * from "./onem2m/m2m_sub"
export * from "./onem2m/m2m_type"
