import * as path from "node:path"
import { cachePathFor } from "../cache-path"

describe("cachePathFor", () => {
  it("shards by the first character", () => {
    expect(cachePathFor("/registryfusion", "example.com")).toEqual({
      shardDir: path.join("/registryfusion", "e"),
      filePath: path.join("/registryfusion", "e", "example.com.xml"),
    })
  })

  it("lowercases the shard but keeps the domain's case", () => {
    expect(cachePathFor("/cache", "Test.COM")).toEqual({
      shardDir: path.join("/cache", "t"),
      filePath: path.join("/cache", "t", "Test.COM.xml"),
    })
  })

  it("uses digits as their own shard", () => {
    expect(cachePathFor("/cache", "123.example").shardDir).toBe(path.join("/cache", "1"))
  })
})
