import { useEffect, useRef } from "react";

/**
 * Ref that is true while the component is mounted. Async handlers check it
 * before setting state after an await.
 */
export function useMounted() {
  const mounted = useRef(false);
  useEffect(() => {
    mounted.current = true;
    return () => {
      mounted.current = false;
    };
  }, []);
  return mounted;
}
