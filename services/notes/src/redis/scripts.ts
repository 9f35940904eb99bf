// Runs as one EVAL so the read and the conditional rewrite/delete are indivisible.
// KEEPTTL (Redis >= 6.0) keeps any expiry attached at creation.
export const CONSUME_NOTE_SCRIPT = `
local key = KEYS[1]
local raw = redis.call('GET', key)
if not raw then
  return nil
end
local data = cjson.decode(raw)
if type(data.views) == 'number' then
  if data.views <= 1 then
    redis.call('DEL', key)
    data.views = 0
  else
    data.views = data.views - 1
    redis.call('SET', key, cjson.encode(data), 'KEEPTTL')
  end
end
return cjson.encode(data)
`;
