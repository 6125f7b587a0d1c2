import { describePrefixTagContract } from "../../ports/__tests__/prefix-tag.contract"
import { ACTION_MARKER, ACTION_TAG_KIND, newActionTag } from "../action/action-tag"

describePrefixTagContract("ActionTag", {
  kind: ACTION_TAG_KIND,
  marker: ACTION_MARKER,
  create: newActionTag,
  unitOwned: { id: "mysql-db/2_a_17", prefix: "mysql-db/2", sequence: 17 },
  serviceOwned: { id: "wordpress_a_0", prefix: "wordpress", sequence: 0 },
  invalidIds: ["", "wordpress", "wordpress_a_", "wordpress_a_01", "wordpress_ar_1", "Mysql/0_a_1"],
})
